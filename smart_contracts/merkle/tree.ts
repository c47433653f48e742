/**
 * Membership tree construction and proof generation.
 *
 * Layer 0 holds the leaf hashes in byte order. Each following layer pairs
 * neighbours with the sorted-pair rule from ./hash. A layer of odd length
 * promotes its last node unchanged, and the proof for that node carries no
 * entry for the layer. verifyProof in ./verifier applies the same rules.
 */

import { ValidationError } from '../lib/errors'
import { fromHash32, hashPair, toHash32, type Hash32 } from './hash'

export const ODD_NODE_POLICY = 'promote' as const

export interface MerkleTree {
  readonly root: Hash32
  /** layers[0] = sorted leaves, last layer = [root] */
  readonly layers: readonly (readonly Buffer[])[]
  readonly leafCount: number
}

export function buildMerkleTree(leaves: readonly Hash32[]): MerkleTree {
  if (leaves.length === 0) {
    throw new ValidationError('EmptyTree: at least one leaf is required')
  }

  const sorted = leaves.map(fromHash32).sort(Buffer.compare)
  const layers: Buffer[][] = [sorted]

  let current = sorted
  while (current.length > 1) {
    const next: Buffer[] = []
    for (let i = 0; i < current.length; i += 2) {
      const right = current[i + 1]
      next.push(right === undefined ? current[i] : hashPair(current[i], right))
    }
    layers.push(next)
    current = next
  }

  return {
    root: toHash32(current[0]),
    layers,
    leafCount: sorted.length,
  }
}

/**
 * Sibling path from `leafIndex` (position in the sorted leaf layer) up to,
 * but excluding, the root.
 */
export function generateProof(layers: readonly (readonly Buffer[])[], leafIndex: number): Hash32[] {
  const leafLayer = layers[0]
  if (!leafLayer || !Number.isInteger(leafIndex) || leafIndex < 0 || leafIndex >= leafLayer.length) {
    throw new ValidationError(`leafIndex ${leafIndex} out of range`)
  }

  const proof: Hash32[] = []
  let index = leafIndex

  for (let level = 0; level < layers.length - 1; level++) {
    const layer = layers[level]
    const siblingIndex = index % 2 === 0 ? index + 1 : index - 1
    const sibling = layer[siblingIndex]
    if (sibling !== undefined) {
      proof.push(toHash32(sibling))
    }
    index = Math.floor(index / 2)
  }

  return proof
}

/**
 * Position of `leaf` in the sorted leaf layer, or -1.
 */
export function findLeafIndex(tree: MerkleTree, leaf: Hash32): number {
  const target = fromHash32(leaf)
  const leafLayer = tree.layers[0] ?? []

  let low = 0
  let high = leafLayer.length - 1
  while (low <= high) {
    const mid = (low + high) >>> 1
    const order = Buffer.compare(leafLayer[mid], target)
    if (order === 0) return mid
    if (order < 0) low = mid + 1
    else high = mid - 1
  }
  return -1
}

export function getProofForLeaf(tree: MerkleTree, leaf: Hash32): Hash32[] {
  const index = findLeafIndex(tree, leaf)
  if (index < 0) {
    throw new ValidationError(`LeafNotInTree: ${leaf}`)
  }
  return generateProof(tree.layers, index)
}
