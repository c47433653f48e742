/**
 * SDK input validation.
 *
 * Core checks (addresses, hashes, task ids) are shared with the ledger; this
 * module adds configuration parsing and validation on top.
 */

import { ValidationError } from '../../../lib/errors'
import { isLogLevel, type LogLevel } from '../../../lib/logger'
import { validateAddress } from '../../../lib/validate'
import { isLeafEncoding, type LeafEncoding } from '../../../merkle/leaf'
import type { RewardLedgerConfig } from '../config/ledger'

export { ValidationError } from '../../../lib/errors'
export { isHash32, validateAddress, validateHash32, validateTaskId } from '../../../lib/validate'

export function parseBigIntSetting(value: string, field: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new ValidationError(`${field} must be a non-negative integer, got ${value}`)
  }
  return BigInt(value)
}

export function parseLeafEncoding(value: string): LeafEncoding {
  if (!isLeafEncoding(value)) {
    throw new ValidationError(`leaf encoding must be 'identity' or 'task-bound', got ${value}`)
  }
  return value
}

export function parseLogLevel(value: string): LogLevel {
  const level = value.toLowerCase()
  if (!isLogLevel(level)) {
    throw new ValidationError(`unknown log level ${value}`)
  }
  return level
}

/**
 * Validate ledger configuration
 */
export function validateLedgerConfig(config: RewardLedgerConfig): void {
  if (!config.ledgerId) {
    throw new ValidationError('ledgerId is required')
  }

  if (config.ledgerAppId <= 0n) {
    throw new ValidationError(`ledgerAppId must be positive, got ${config.ledgerAppId}`)
  }

  validateAddress(config.adminAddress, 'adminAddress')
  validateAddress(config.validatorAddress, 'validatorAddress')

  if (!isLeafEncoding(config.leafEncoding)) {
    throw new ValidationError(`unknown leaf encoding ${config.leafEncoding}`)
  }

  if (!config.rewardTokenSymbol) {
    throw new ValidationError('rewardTokenSymbol is required')
  }

  if (config.rewardTokenSupplyCap <= 0n) {
    throw new ValidationError(`rewardTokenSupplyCap must be positive, got ${config.rewardTokenSupplyCap}`)
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ValidationError(`unknown log level ${config.logLevel}`)
  }
}
