/**
 * Hash primitives for the membership tree.
 *
 * Commitment format:
 * - H = keccak-256
 * - parent = H(min(a, b) || max(a, b)), byte order comparison
 * - hashes travel as lowercase 0x-prefixed hex (Hash32)
 */

import keccak256 from 'keccak256'
import { validateHash32 } from '../lib/validate'

export type Hash32 = string

export function keccak(data: Uint8Array): Buffer {
  return keccak256(Buffer.from(data))
}

export function toHash32(bytes: Uint8Array): Hash32 {
  return `0x${Buffer.from(bytes).toString('hex')}`
}

export function fromHash32(value: Hash32): Buffer {
  validateHash32(value)
  return Buffer.from(value.slice(2), 'hex')
}

export function normalizeHash32(value: Hash32): Hash32 {
  validateHash32(value)
  return value.toLowerCase()
}

export function hashPair(a: Buffer, b: Buffer): Buffer {
  return Buffer.compare(a, b) <= 0 ? keccak(Buffer.concat([a, b])) : keccak(Buffer.concat([b, a]))
}
