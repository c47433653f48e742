/**
 * Reward Ledger Configuration
 *
 * Deployment-specific values for one ledger instance. The escrow account is
 * the application address of `ledgerAppId`.
 */

import algosdk from 'algosdk'
import type { LogLevel } from '../../../lib/logger'
import type { LeafEncoding } from '../../../merkle/leaf'
import { parseBigIntSetting, parseLeafEncoding, parseLogLevel, validateLedgerConfig } from '../lib/validate'

export interface RewardLedgerConfig {
  /** Ledger identifier (for outputs and logging) */
  ledgerId: string

  /** Application id; its address holds the escrow */
  ledgerAppId: bigint

  /** Admin address (task lifecycle, pause, sweep; also the token minter) */
  adminAddress: string

  /** Validator address (membership root updates) */
  validatorAddress: string

  /** Leaf encoding shared by the allowlist builder and the claim ledger */
  leafEncoding: LeafEncoding

  /** Reward token symbol */
  rewardTokenSymbol: string

  /** Reward token supply cap (base units) */
  rewardTokenSupplyCap: bigint

  /** Minimum log level */
  logLevel: LogLevel
}

/**
 * Default configuration for local runs. Accounts are placeholders derived
 * from fixed application ids.
 */
export const LOCALNET_CONFIG: RewardLedgerConfig = {
  ledgerId: 'rewards-localnet',
  ledgerAppId: 1005n,
  adminAddress: algosdk.getApplicationAddress(1001n),
  validatorAddress: algosdk.getApplicationAddress(1002n),
  leafEncoding: 'identity',
  rewardTokenSymbol: 'RWD',
  rewardTokenSupplyCap: 1_000_000_000_000n,
  logLevel: 'info',
}

/**
 * Build a configuration from environment variables over `base`.
 *
 *   LEDGER_ID, LEDGER_APP_ID, LEDGER_ADMIN, LEDGER_VALIDATOR,
 *   LEDGER_LEAF_ENCODING, REWARD_TOKEN_SYMBOL, REWARD_TOKEN_CAP, LOG_LEVEL
 *
 * Unset or empty variables keep the base value. The result is validated.
 */
export function loadLedgerConfig(
  env: Record<string, string | undefined> = process.env,
  base: RewardLedgerConfig = LOCALNET_CONFIG
): RewardLedgerConfig {
  const read = (name: string): string | undefined => {
    const value = env[name]?.trim()
    return value ? value : undefined
  }

  const appId = read('LEDGER_APP_ID')
  const encoding = read('LEDGER_LEAF_ENCODING')
  const cap = read('REWARD_TOKEN_CAP')
  const level = read('LOG_LEVEL')

  const config: RewardLedgerConfig = {
    ledgerId: read('LEDGER_ID') ?? base.ledgerId,
    ledgerAppId: appId ? parseBigIntSetting(appId, 'LEDGER_APP_ID') : base.ledgerAppId,
    adminAddress: read('LEDGER_ADMIN') ?? base.adminAddress,
    validatorAddress: read('LEDGER_VALIDATOR') ?? base.validatorAddress,
    leafEncoding: encoding ? parseLeafEncoding(encoding) : base.leafEncoding,
    rewardTokenSymbol: read('REWARD_TOKEN_SYMBOL') ?? base.rewardTokenSymbol,
    rewardTokenSupplyCap: cap ? parseBigIntSetting(cap, 'REWARD_TOKEN_CAP') : base.rewardTokenSupplyCap,
    logLevel: level ? parseLogLevel(level) : base.logLevel,
  }

  validateLedgerConfig(config)
  return config
}
