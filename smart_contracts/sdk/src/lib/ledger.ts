/**
 * Ledger wiring
 *
 * Assembles one in-process ledger from configuration: reward token, escrow
 * custody, role registry and the distributor (task registry, claim ledger,
 * pause switch).
 */

import algosdk from 'algosdk'
import { RoleRegistry } from '../../../access_guard/contract'
import type { Clock } from '../../../lib/clock'
import { createLogger, type Logger } from '../../../lib/logger'
import { getLeafEncoder } from '../../../merkle/leaf'
import { RewardDistributor } from '../../../reward_distributor/contract'
import { RewardToken } from '../../../reward_token/contract'
import { EscrowCustody } from '../../../reward_token/custody'
import type { RewardLedgerConfig } from '../config/ledger'
import { validateLedgerConfig } from './validate'

export interface RewardLedger {
  config: RewardLedgerConfig
  token: RewardToken
  custody: EscrowCustody
  roles: RoleRegistry
  distributor: RewardDistributor
  escrowAddress: string
  logger: Logger
}

export interface CreateRewardLedgerOptions {
  /** Defaults to system time */
  clock?: Clock
  /** Defaults to a console logger scoped to the ledger id */
  logger?: Logger
}

export function createRewardLedger(config: RewardLedgerConfig, options: CreateRewardLedgerOptions = {}): RewardLedger {
  validateLedgerConfig(config)

  const logger = options.logger ?? createLogger(config.ledgerId, config.logLevel)
  const escrowAddress = algosdk.getApplicationAddress(config.ledgerAppId)

  const token = new RewardToken(config.rewardTokenSymbol, config.rewardTokenSupplyCap, config.adminAddress)
  const custody = new EscrowCustody(token, escrowAddress)

  const roles = new RoleRegistry(config.adminAddress)
  roles.grantRole(config.adminAddress, 'Validator', config.validatorAddress)

  const distributor = new RewardDistributor({
    access: roles,
    custody,
    clock: options.clock,
    logger: logger.child('ledger'),
    leafEncoder: getLeafEncoder(config.leafEncoding),
  })

  logger.debug(`ledger ${config.ledgerId} ready`, { escrow: escrowAddress, leafEncoding: config.leafEncoding })

  return { config, token, custody, roles, distributor, escrowAddress, logger }
}
