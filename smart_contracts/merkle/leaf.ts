/**
 * Leaf encodings.
 *
 * Which encoding a deployment uses is a configuration choice, and the tree
 * builder and the claim ledger must be handed the same one:
 *
 * - identity:   leaf = H(publicKey)
 *   One root can serve several tasks; a proof is valid for every task that
 *   shares the root.
 * - task-bound: leaf = H(taskId as uint64 big-endian || publicKey)
 *   A proof only verifies for the task it was issued for.
 */

import algosdk from 'algosdk'
import { ValidationError } from '../lib/errors'
import { validateAddress } from '../lib/validate'
import { keccak, toHash32, type Hash32 } from './hash'

export type LeafEncoding = 'identity' | 'task-bound'

export const LEAF_ENCODINGS: readonly LeafEncoding[] = ['identity', 'task-bound']

export interface LeafEncoder {
  readonly encoding: LeafEncoding
  encode(identity: string, taskId: bigint): Hash32
}

/**
 * Canonical identity bytes: the 32-byte public key behind an address.
 */
export function identityBytes(address: string): Uint8Array {
  validateAddress(address, 'identity')
  return algosdk.decodeAddress(address).publicKey
}

export const IDENTITY_LEAF_ENCODER: LeafEncoder = {
  encoding: 'identity',
  encode: (identity) => toHash32(keccak(identityBytes(identity))),
}

export const TASK_BOUND_LEAF_ENCODER: LeafEncoder = {
  encoding: 'task-bound',
  encode: (identity, taskId) => {
    const prefix = Buffer.alloc(8)
    prefix.writeBigUInt64BE(taskId)
    return toHash32(keccak(Buffer.concat([prefix, identityBytes(identity)])))
  },
}

export function isLeafEncoding(value: string): value is LeafEncoding {
  return (LEAF_ENCODINGS as readonly string[]).includes(value)
}

export function getLeafEncoder(encoding: LeafEncoding): LeafEncoder {
  switch (encoding) {
    case 'identity':
      return IDENTITY_LEAF_ENCODER
    case 'task-bound':
      return TASK_BOUND_LEAF_ENCODER
    default:
      throw new ValidationError(`Unknown leaf encoding: ${String(encoding)}`)
  }
}
