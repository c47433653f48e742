import { assert } from '../lib/errors'
import type { LedgerRuntime } from '../lib/runtime'
import { BoxMap, GlobalState } from '../lib/storage'
import { validateAddress } from '../lib/validate'
import type { Hash32 } from '../merkle/hash'
import { IDENTITY_LEAF_ENCODER, type LeafEncoder } from '../merkle/leaf'
import { verifyProof } from '../merkle/verifier'
import type { TokenCustody } from '../reward_token/custody'
import type { ClaimRecorder, TaskRegistry } from '../task_registry/contract'

/**
 * ClaimLedger: per-task claim facts and the claim authorization algorithm.
 *
 * claim() applies its checks in a fixed order; when several conditions fail,
 * the first one in this list is the error the caller sees:
 *
 *   1. Paused                  pause switch engaged
 *   2. TaskNotActive           task missing or active == false
 *   3. TaskNotStarted          now < startTime
 *   4. TaskEnded               now > endTime
 *   5. AlreadyClaimed          (taskId, claimant) already recorded
 *   6. MaxClaimsReached        claimCount >= maxClaims
 *   7. InsufficientRewardPool  claimedAmount + rewardAmount > totalPool
 *   8. InvalidProof            proof does not lead to the task's root
 *
 * A malformed claimant address fails with ValidationError, after the pause
 * check and before the task checks.
 *
 * Effects (record, counters, payout, event) are applied as one unit: if the
 * payout throws, nothing of the claim survives.
 */

export interface PauseSwitch {
  isPaused(): boolean
}

export interface ClaimRecord {
  readonly taskId: bigint
  readonly identity: string
  readonly amount: bigint
  readonly claimedAt: bigint
}

export interface ClaimReceipt extends ClaimRecord {
  /** Claim count of the task after this claim */
  readonly claimCount: bigint
  /** totalPool - claimedAmount after this claim */
  readonly remainingRewards: bigint
}

export interface ClaimLedgerOptions {
  /** Defaults to the identity-only encoding */
  leafEncoder?: LeafEncoder
}

interface ClaimKey {
  taskId: bigint
  identity: string
}

export class ClaimLedger {
  private readonly claims: BoxMap<ClaimKey, ClaimRecord>
  private readonly totalDistributed: GlobalState<bigint>
  private readonly recordClaim: ClaimRecorder
  readonly leafEncoder: LeafEncoder

  constructor(
    private readonly runtime: LedgerRuntime,
    private readonly registry: TaskRegistry,
    private readonly custody: TokenCustody,
    private readonly pauseSwitch: PauseSwitch,
    options: ClaimLedgerOptions = {}
  ) {
    this.claims = new BoxMap(runtime.journal, 'claimed:', (key) => `${key.taskId}:${key.identity}`)
    this.totalDistributed = new GlobalState(runtime.journal, 0n)
    this.recordClaim = registry.issueClaimRecorder()
    this.leafEncoder = options.leafEncoder ?? IDENTITY_LEAF_ENCODER
  }

  /**
   * Claim the task's fixed reward for `claimant` with a membership proof.
   */
  claim(claimant: string, taskId: bigint, proof: readonly Hash32[]): ClaimReceipt {
    return this.runtime.mutate('claim', () => {
      assert(!this.pauseSwitch.isPaused(), 'Paused')
      validateAddress(claimant, 'claimant')

      const task = this.registry.findTask(taskId)
      assert(task !== undefined && task.active, 'TaskNotActive', `task ${taskId}`)

      const now = this.runtime.now()
      assert(now >= task.startTime, 'TaskNotStarted', `starts at ${task.startTime}`)
      assert(now <= task.endTime, 'TaskEnded', `ended at ${task.endTime}`)

      const key: ClaimKey = { taskId, identity: claimant }
      assert(!this.claims.has(key), 'AlreadyClaimed', claimant)

      assert(task.claimCount < task.maxClaims, 'MaxClaimsReached')
      assert(task.claimedAmount + task.rewardAmount <= task.totalPool, 'InsufficientRewardPool')

      const leaf = this.leafEncoder.encode(claimant, taskId)
      assert(verifyProof(task.membershipRoot, leaf, proof), 'InvalidProof')

      // Effects
      const record: ClaimRecord = Object.freeze({
        taskId,
        identity: claimant,
        amount: task.rewardAmount,
        claimedAt: now,
      })
      this.claims.set(key, record)
      const updated = this.recordClaim(taskId)
      this.totalDistributed.value = this.totalDistributed.value + task.rewardAmount

      // Interaction
      this.custody.pay(claimant, task.rewardAmount)

      this.runtime.events.emit('RewardClaimed', { taskId, identity: claimant }, { amount: task.rewardAmount })
      this.runtime.logger.debug(`task ${taskId} claimed by ${claimant}`, { amount: task.rewardAmount })

      return {
        ...record,
        claimCount: updated.claimCount,
        remainingRewards: updated.totalPool - updated.claimedAmount,
      }
    })
  }

  /**
   * Whether `proof` proves membership of `identity` under the task's current
   * root and the identity has not claimed yet.
   *
   * This is narrower than claimability: time window, active flag, claim cap
   * and pool balance are not consulted, so `true` does not mean claim() would
   * succeed right now. Unknown tasks report false.
   */
  isEligible(taskId: bigint, identity: string, proof: readonly Hash32[]): boolean {
    validateAddress(identity, 'identity')

    const task = this.registry.findTask(taskId)
    if (task === undefined) return false
    if (this.claims.has({ taskId, identity })) return false

    return verifyProof(task.membershipRoot, this.leafEncoder.encode(identity, taskId), proof)
  }

  hasClaimed(taskId: bigint, identity: string): boolean {
    const [, exists] = this.claims.maybe({ taskId, identity })
    return exists
  }

  getClaim(taskId: bigint, identity: string): ClaimRecord | undefined {
    return this.claims.get({ taskId, identity })
  }

  /** Sum of every payout across all tasks */
  getTotalDistributed(): bigint {
    return this.totalDistributed.value
  }
}
