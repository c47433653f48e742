/**
 * Allowlist Builder
 *
 * Turns a list of identity addresses into a membership root plus one proof
 * per identity, and persists the result as a self-checking artifact.
 */

import algosdk from 'algosdk'
import fs from 'fs'
import path from 'path'
import { silentLogger, type Logger } from '../../../lib/logger'
import { isHash32 } from '../../../lib/validate'
import type { Hash32 } from '../../../merkle/hash'
import { getLeafEncoder, isLeafEncoding, type LeafEncoding } from '../../../merkle/leaf'
import { buildMerkleTree, getProofForLeaf, ODD_NODE_POLICY } from '../../../merkle/tree'
import { verifyProof } from '../../../merkle/verifier'
import { hashCanonicalJson, toCanonicalJson } from '../lib/hash'
import {
  AllowlistValidationError,
  type AllowlistArtifact,
  type AllowlistEntry,
  type ComputeAllowlistParams,
} from '../types/allowlist'

export const ALLOWLIST_VERSION = '1.0.0'

function resolveTaskId(leafEncoding: LeafEncoding, taskId: bigint | undefined): bigint | null {
  if (leafEncoding === 'identity') {
    return null
  }
  if (taskId === undefined || taskId <= 0n) {
    throw new AllowlistValidationError('task-bound leaves need a positive taskId')
  }
  return taskId
}

function normalizeAddresses(addresses: readonly string[]): string[] {
  const unique = new Set<string>()

  addresses.forEach((raw, index) => {
    const address = raw.trim()
    if (!algosdk.isValidAddress(address)) {
      throw new AllowlistValidationError(`entry ${index} is not a valid address: ${raw}`)
    }
    unique.add(address)
  })

  if (unique.size === 0) {
    throw new AllowlistValidationError('at least one address is required')
  }

  return [...unique].sort()
}

function artifactHash(artifact: Omit<AllowlistArtifact, 'hash' | 'builtAt'>): string {
  return hashCanonicalJson({
    version: artifact.version,
    leafEncoding: artifact.leafEncoding,
    oddNodePolicy: artifact.oddNodePolicy,
    taskId: artifact.taskId,
    root: artifact.root,
    leafCount: artifact.leafCount,
    entries: artifact.entries,
  })
}

/**
 * Compute the allowlist for a set of identities
 *
 * Algorithm:
 * 1. Validate and dedupe addresses, sort them
 * 2. Encode one leaf per identity with the chosen encoding
 * 3. Build the tree and collect each identity's proof
 * 4. Hash the canonical JSON of the result
 */
export function computeAllowlist(params: ComputeAllowlistParams): AllowlistArtifact {
  const leafEncoding = params.leafEncoding ?? 'identity'
  const encoder = getLeafEncoder(leafEncoding)
  const taskId = resolveTaskId(leafEncoding, params.taskId)
  const addresses = normalizeAddresses(params.addresses)

  const leaves = addresses.map((address) => encoder.encode(address, taskId ?? 0n))
  const tree = buildMerkleTree(leaves)

  const entries: AllowlistEntry[] = addresses.map((address, index) => ({
    address,
    leaf: leaves[index],
    proof: getProofForLeaf(tree, leaves[index]),
  }))

  const body = {
    version: ALLOWLIST_VERSION,
    leafEncoding,
    oddNodePolicy: ODD_NODE_POLICY,
    taskId: taskId === null ? null : taskId.toString(),
    root: tree.root,
    leafCount: tree.leafCount,
    entries,
  }

  return {
    ...body,
    hash: artifactHash(body),
    builtAt: params.builtAt ?? Math.floor(Date.now() / 1000),
  }
}

/**
 * Check an artifact against itself: content hash, leaf encoding of every
 * entry, and every proof against the root.
 */
export function verifyAllowlist(artifact: AllowlistArtifact): void {
  if (artifactHash(artifact) !== artifact.hash) {
    throw new AllowlistValidationError('content hash mismatch')
  }

  if (artifact.leafCount !== artifact.entries.length) {
    throw new AllowlistValidationError(`leafCount ${artifact.leafCount} but ${artifact.entries.length} entries`)
  }

  const encoder = getLeafEncoder(artifact.leafEncoding)
  const taskId = artifact.taskId === null ? 0n : BigInt(artifact.taskId)

  for (const entry of artifact.entries) {
    if (encoder.encode(entry.address, taskId) !== entry.leaf) {
      throw new AllowlistValidationError(`leaf mismatch for ${entry.address}`)
    }
    if (!verifyProof(artifact.root, entry.leaf, entry.proof)) {
      throw new AllowlistValidationError(`proof for ${entry.address} does not reach the root`)
    }
  }
}

export function findAllowlistEntry(artifact: AllowlistArtifact, address: string): AllowlistEntry | undefined {
  return artifact.entries.find((entry) => entry.address === address)
}

// -----------------------
// Persistence
// -----------------------

/**
 * Save allowlist to file (canonical JSON)
 */
export function saveAllowlistToFile(artifact: AllowlistArtifact, outputPath: string, logger: Logger = silentLogger): void {
  fs.mkdirSync(path.dirname(outputPath), { recursive: true })
  fs.writeFileSync(outputPath, toCanonicalJson(artifact), 'utf-8')

  logger.info(`Allowlist saved to: ${outputPath}`)
  logger.info(`Root: ${artifact.root}`)
  logger.info(`Entries: ${artifact.leafCount}`)
  logger.info(`Hash: ${artifact.hash}`)
}

/**
 * Load and verify an allowlist file
 */
export function loadAllowlistFromFile(inputPath: string): AllowlistArtifact {
  const raw: unknown = JSON.parse(fs.readFileSync(inputPath, 'utf-8'))
  const artifact = parseAllowlistArtifact(raw)
  verifyAllowlist(artifact)
  return artifact
}

// -----------------------
// Parsing
// -----------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readString(record: Record<string, unknown>, field: string): string {
  const value = record[field]
  if (typeof value !== 'string') {
    throw new AllowlistValidationError(`${field} must be a string`)
  }
  return value
}

function readNumber(record: Record<string, unknown>, field: string): number {
  const value = record[field]
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new AllowlistValidationError(`${field} must be a non-negative integer`)
  }
  return value
}

function readHash(value: unknown, field: string): Hash32 {
  if (typeof value !== 'string' || !isHash32(value)) {
    throw new AllowlistValidationError(`${field} must be a 32-byte hex hash`)
  }
  return value
}

function parseEntry(value: unknown, index: number): AllowlistEntry {
  if (!isRecord(value) || !Array.isArray(value.proof)) {
    throw new AllowlistValidationError(`entry ${index} is malformed`)
  }
  return {
    address: readString(value, 'address'),
    leaf: readHash(value.leaf, `entries[${index}].leaf`),
    proof: value.proof.map((element, position) => readHash(element, `entries[${index}].proof[${position}]`)),
  }
}

function parseTaskId(value: unknown): string | null {
  if (value === null) return null
  if (typeof value === 'string' && /^\d+$/.test(value)) return value
  throw new AllowlistValidationError('taskId must be a decimal string or null')
}

export function parseAllowlistArtifact(value: unknown): AllowlistArtifact {
  if (!isRecord(value)) {
    throw new AllowlistValidationError('artifact must be a JSON object')
  }

  const leafEncoding = readString(value, 'leafEncoding')
  if (!isLeafEncoding(leafEncoding)) {
    throw new AllowlistValidationError(`unknown leaf encoding ${leafEncoding}`)
  }

  if (value.oddNodePolicy !== ODD_NODE_POLICY) {
    throw new AllowlistValidationError(`unsupported odd-node policy ${String(value.oddNodePolicy)}`)
  }

  if (!Array.isArray(value.entries)) {
    throw new AllowlistValidationError('entries must be an array')
  }

  return {
    version: readString(value, 'version'),
    leafEncoding,
    oddNodePolicy: ODD_NODE_POLICY,
    taskId: parseTaskId(value.taskId),
    root: readHash(value.root, 'root'),
    leafCount: readNumber(value, 'leafCount'),
    entries: value.entries.map(parseEntry),
    hash: readString(value, 'hash'),
    builtAt: readNumber(value, 'builtAt'),
  }
}
