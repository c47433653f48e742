/**
 * Allowlist Data Structures
 *
 * Off-chain membership artifacts: the root an operator commits to a task and
 * the proofs claimants present.
 */

import type { Hash32 } from '../../../merkle/hash'
import type { LeafEncoding } from '../../../merkle/leaf'
import type { ODD_NODE_POLICY } from '../../../merkle/tree'

/**
 * Single allowlisted identity
 */
export interface AllowlistEntry {
  /** Identity address */
  address: string

  /** Encoded leaf hash */
  leaf: Hash32

  /** Sibling path to the root */
  proof: Hash32[]
}

/**
 * Complete allowlist for one task (or a root shared by several tasks)
 */
export interface AllowlistArtifact {
  /** Artifact format version */
  version: string

  /** Leaf encoding the tree was built with */
  leafEncoding: LeafEncoding

  /** Odd-node rule the tree was built with */
  oddNodePolicy: typeof ODD_NODE_POLICY

  /** Task id the leaves are bound to (decimal string), null for identity leaves */
  taskId: string | null

  /** Membership root */
  root: Hash32

  /** Number of distinct identities */
  leafCount: number

  /** One entry per identity, sorted by address */
  entries: AllowlistEntry[]

  /** SHA-256 of the canonical JSON of every field above */
  hash: string

  /** Build timestamp (unix seconds), not covered by `hash` */
  builtAt: number
}

/**
 * Allowlist computation parameters
 */
export interface ComputeAllowlistParams {
  /** Identity addresses; duplicates are dropped */
  addresses: readonly string[]

  /** Defaults to 'identity' */
  leafEncoding?: LeafEncoding

  /** Required for 'task-bound' leaves */
  taskId?: bigint

  /** Overrides the build timestamp */
  builtAt?: number
}

/**
 * Validation error for allowlists
 */
export class AllowlistValidationError extends Error {
  constructor(message: string) {
    super(`Allowlist validation failed: ${message}`)
    this.name = 'AllowlistValidationError'
  }
}
