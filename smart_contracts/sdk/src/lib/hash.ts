/**
 * Canonical JSON and SHA-256 helpers for allowlist artifacts.
 *
 * Canonical form: object keys sorted, bigint written as decimal strings, no
 * whitespace. Two artifacts with the same content always hash the same.
 */

import { createHash } from 'crypto'

function canonicalize(value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString()
  }
  if (Array.isArray(value)) {
    return value.map(canonicalize)
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {}
    for (const key of Object.keys(value).sort()) {
      sorted[key] = canonicalize(Reflect.get(value, key))
    }
    return sorted
  }
  return value
}

/**
 * Serialize with sorted keys and bigint support
 */
export function toCanonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value))
}

/**
 * SHA-256 of a UTF-8 string, lowercase hex
 */
export function sha256(data: string): string {
  return createHash('sha256').update(data, 'utf-8').digest('hex')
}

export function hashCanonicalJson(value: unknown): string {
  return sha256(toCanonicalJson(value))
}
