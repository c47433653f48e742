import { fromHash32, hashPair, type Hash32 } from './hash'
import { isHash32 } from '../lib/validate'

/**
 * Membership check: fold `proof` into `leaf` with the sorted-pair rule and
 * compare against `root`. Malformed input is a non-member, never an error.
 */
export function verifyProof(root: Hash32, leaf: Hash32, proof: readonly Hash32[]): boolean {
  if (!isHash32(root) || !isHash32(leaf) || !proof.every(isHash32)) {
    return false
  }

  let computed = fromHash32(leaf)
  for (const element of proof) {
    computed = hashPair(computed, fromHash32(element))
  }
  return computed.equals(fromHash32(root))
}
