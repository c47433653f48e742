/**
 * Reward Claimant API
 *
 * **Public interface for allowlisted identities**
 *
 * Looks up the identity's proof in a published allowlist and claims the
 * task's fixed reward with it.
 */

import type { Logger } from '../../../lib/logger'
import type { TaskStatus } from '../../../task_registry/contract'
import { findAllowlistEntry } from '../builders/allowlist'
import type { RewardLedger } from '../lib/ledger'
import { validateAddress, validateTaskId } from '../lib/validate'
import type { AllowlistArtifact } from '../types/allowlist'

/**
 * Claim result
 */
export interface ClaimResult {
  /** Task claimed from */
  taskId: bigint

  /** Claimant address */
  claimant: string

  /** Amount paid */
  amountClaimed: bigint

  /** Task claim count after this claim */
  claimCount: bigint

  /** Rewards left in the task's pool */
  remainingRewards: bigint
}

export type IneligibleReason = 'NotInAllowlist' | 'AlreadyClaimed' | 'ProofRejected'

export interface EligibilityPreview {
  taskId: bigint
  claimant: string
  status: TaskStatus
  eligible: boolean
  reason?: IneligibleReason
}

/**
 * Reward Claimant - Public claim interface
 */
export class RewardClaimant {
  private readonly logger: Logger

  constructor(private readonly ledger: RewardLedger) {
    this.logger = ledger.logger.child('claimant')
  }

  /**
   * Whether `claimant` holds a proof the task's current root accepts and has
   * not claimed yet. Task status is reported alongside; an eligible identity
   * can still be refused while the task is scheduled, inactive or ended.
   */
  previewEligibility(taskId: bigint, claimant: string, allowlist: AllowlistArtifact): EligibilityPreview {
    validateTaskId(taskId)
    validateAddress(claimant, 'claimant')

    const { distributor } = this.ledger
    const status = distributor.getTaskStatus(taskId)
    const entry = findAllowlistEntry(allowlist, claimant)

    if (!entry) {
      return { taskId, claimant, status, eligible: false, reason: 'NotInAllowlist' }
    }
    if (distributor.hasClaimed(taskId, claimant)) {
      return { taskId, claimant, status, eligible: false, reason: 'AlreadyClaimed' }
    }
    if (!distributor.isEligible(taskId, claimant, entry.proof)) {
      return { taskId, claimant, status, eligible: false, reason: 'ProofRejected' }
    }
    return { taskId, claimant, status, eligible: true }
  }

  /**
   * Claim the task's reward for `claimant`
   *
   * Constraints (enforced by the ledger):
   * - Claims not paused, task active and inside its window
   * - Claimant not yet paid for this task
   * - Claim cap and pool not exhausted
   * - Proof valid against the current root
   */
  claim(taskId: bigint, claimant: string, allowlist: AllowlistArtifact): ClaimResult {
    this.logger.info(`=== Claim Task ${taskId} ===`)

    validateTaskId(taskId)
    validateAddress(claimant, 'claimant')

    // Step 1: Look up the proof (an identity missing from the allowlist
    // submits an empty one; the ledger's checks decide the error)
    const entry = findAllowlistEntry(allowlist, claimant)
    const proof = entry?.proof ?? []
    if (!entry) {
      this.logger.warn(`${claimant} is not in the allowlist, submitting an empty proof`)
    }
    this.logger.debug(`Proof length: ${proof.length}`)

    // Step 2: Preview (the ledger still decides)
    if (!this.ledger.distributor.isEligible(taskId, claimant, proof)) {
      this.logger.warn('Proof not accepted by the current root or already claimed, submitting anyway')
    }

    // Step 3: Claim
    const receipt = this.ledger.distributor.claim(claimant, taskId, proof)

    this.logger.info(`Claim successful: ${receipt.amount} to ${claimant}`)

    return {
      taskId,
      claimant,
      amountClaimed: receipt.amount,
      claimCount: receipt.claimCount,
      remainingRewards: receipt.remainingRewards,
    }
  }

  /**
   * Tasks this identity has been paid for, with amount and time
   */
  getClaimHistory(claimant: string): Array<{ taskId: bigint; amountClaimed: bigint; claimedAt: bigint }> {
    validateAddress(claimant, 'claimant')

    const { distributor } = this.ledger
    return distributor
      .getEvents({ name: 'RewardClaimed', identity: claimant })
      .flatMap((event) => {
        const record = event.taskId === undefined ? undefined : distributor.getClaim(event.taskId, claimant)
        return record ? [{ taskId: record.taskId, amountClaimed: record.amount, claimedAt: record.claimedAt }] : []
      })
  }
}
