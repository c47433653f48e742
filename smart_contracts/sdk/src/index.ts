/**
 * Reward Ledger SDK - Main Entrypoint
 *
 * Exports Operator and Claimant APIs plus the allowlist tooling.
 */

// Configuration
export type { RewardLedgerConfig } from './config/ledger'
export { LOCALNET_CONFIG, loadLedgerConfig } from './config/ledger'

// Types
export type { AllowlistArtifact, AllowlistEntry, ComputeAllowlistParams } from './types/allowlist'
export { AllowlistValidationError } from './types/allowlist'

// Lib utilities
export { toCanonicalJson, sha256, hashCanonicalJson } from './lib/hash'
export {
  ValidationError,
  validateAddress,
  validateHash32,
  validateTaskId,
  validateLedgerConfig,
  parseBigIntSetting,
  parseLeafEncoding,
  parseLogLevel,
} from './lib/validate'
export type { RewardLedger, CreateRewardLedgerOptions } from './lib/ledger'
export { createRewardLedger } from './lib/ledger'

// Builders
export {
  ALLOWLIST_VERSION,
  computeAllowlist,
  verifyAllowlist,
  findAllowlistEntry,
  saveAllowlistToFile,
  loadAllowlistFromFile,
  parseAllowlistArtifact,
} from './builders/allowlist'

// Operations
export type { LaunchTaskParams, LaunchedTask, TaskSummary } from './ops/operator'
export { RewardOperator } from './ops/operator'
export type { ClaimResult, EligibilityPreview, IneligibleReason } from './ops/claimant'
export { RewardClaimant } from './ops/claimant'

/**
 * SDK Version
 */
export const SDK_VERSION = '1.0.0'
