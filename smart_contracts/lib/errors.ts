/**
 * Ledger error families.
 *
 * Every failed check maps to exactly one named code. Messages embed the code so
 * callers can match on either `error.code` or the message text.
 *
 * - LedgerError: domain state (time window, pool, proof, ...)
 * - AuthorizationError: caller lacks a role
 * - ReentrancyError: nested mutation while another one is in flight
 * - TokenError: custody / token accounting failure
 * - ValidationError: malformed input (addresses, hashes, ids)
 */

export type LedgerErrorCode =
  | 'InvalidAmount'
  | 'InvalidTimeRange'
  | 'TaskNotFound'
  | 'TaskNotActive'
  | 'TaskNotStarted'
  | 'TaskEnded'
  | 'TaskNotEnded'
  | 'AlreadyClaimed'
  | 'MaxClaimsReached'
  | 'InsufficientRewardPool'
  | 'InvalidProof'
  | 'Paused'

export class LedgerError extends Error {
  constructor(
    readonly code: LedgerErrorCode,
    detail?: string
  ) {
    super(detail ? `${code}: ${detail}` : code)
    this.name = 'LedgerError'
  }
}

export class AuthorizationError extends Error {
  readonly code = 'Unauthorized'

  constructor(
    readonly principal: string,
    readonly role: string
  ) {
    super(`Unauthorized: ${principal} lacks role ${role}`)
    this.name = 'AuthorizationError'
  }
}

export class ReentrancyError extends Error {
  readonly code = 'ReentrantCall'

  constructor(
    readonly operation: string,
    readonly inFlight: string
  ) {
    super(`ReentrantCall: ${operation} attempted while ${inFlight} is in progress`)
    this.name = 'ReentrancyError'
  }
}

export type TokenErrorCode = 'InsufficientBalance' | 'InsufficientAllowance' | 'SupplyCapExceeded' | 'NotMinter' | 'InvalidTransferAmount'

export class TokenError extends Error {
  constructor(
    readonly code: TokenErrorCode,
    detail?: string
  ) {
    super(detail ? `${code}: ${detail}` : code)
    this.name = 'TokenError'
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(`Validation failed: ${message}`)
    this.name = 'ValidationError'
  }
}

/**
 * Contract-style assertion: throws a LedgerError carrying `code` when the
 * condition does not hold.
 */
export function assert(condition: unknown, code: LedgerErrorCode, detail?: string): asserts condition {
  if (!condition) {
    throw new LedgerError(code, detail)
  }
}
