/**
 * Reward Operator API
 *
 * **Admin workflows for one reward ledger**
 *
 * - Task launch (fund, approve, create)
 * - Membership root rotation
 * - Pool top-ups and post-window sweeps
 * - Emergency pause
 * - Task summaries for reporting
 *
 * Acts as the configured admin and validator of the ledger.
 */

import { assert } from '../../../lib/errors'
import type { Logger } from '../../../lib/logger'
import type { TaskStatus } from '../../../task_registry/contract'
import type { RewardLedger } from '../lib/ledger'
import { validateTaskId } from '../lib/validate'
import { AllowlistValidationError, type AllowlistArtifact } from '../types/allowlist'

/**
 * Task launch parameters
 */
export interface LaunchTaskParams {
  /** Display label */
  name: string

  /** Allowlist the task is gated on */
  allowlist: AllowlistArtifact

  /** Fixed payout per claim */
  rewardAmount: bigint

  /** Claim cap (defaults to the allowlist size) */
  maxClaims?: bigint

  /** Pool to escrow (defaults to rewardAmount * maxClaims) */
  totalPool?: bigint

  /** Window start (defaults to now) */
  startTime?: bigint

  /** Window length in seconds */
  durationSeconds: bigint
}

export interface LaunchedTask {
  taskId: bigint
  membershipRoot: string
  totalPool: bigint
  maxClaims: bigint
  startTime: bigint
  endTime: bigint
}

export interface TaskSummary {
  taskId: bigint
  name: string
  status: TaskStatus
  rewardAmount: bigint
  claimCount: bigint
  maxClaims: bigint
  claimedAmount: bigint
  totalPool: bigint
  remainingRewards: bigint
  remainingClaims: bigint
}

/**
 * Reward Operator - Admin workflows
 */
export class RewardOperator {
  private readonly logger: Logger

  constructor(private readonly ledger: RewardLedger) {
    this.logger = ledger.logger.child('operator')
  }

  private get admin(): string {
    return this.ledger.config.adminAddress
  }

  private get validator(): string {
    return this.ledger.config.validatorAddress
  }

  /**
   * Make `amount` available to the escrow from the admin account (mint any
   * shortfall, raise the escrow's allowance), then run the ledger call that
   * pulls it. If that call fails the allowance goes back to what it was;
   * minted tokens stay with the admin and count toward the next funding.
   */
  private fundFromAdmin<T>(amount: bigint, ledgerCall: () => T): T {
    const { token, escrowAddress } = this.ledger
    const previousAllowance = token.allowance(this.admin, escrowAddress)

    const balance = token.balanceOf(this.admin)
    if (balance < amount) {
      this.logger.info(`Minting ${amount - balance} ${token.symbol} to admin`)
      token.mint(this.admin, this.admin, amount - balance)
    }

    token.approve(this.admin, escrowAddress, previousAllowance + amount)

    try {
      return ledgerCall()
    } catch (error) {
      token.approve(this.admin, escrowAddress, previousAllowance)
      this.logger.warn(`Ledger call failed, escrow allowance restored to ${previousAllowance}`)
      throw error
    }
  }

  /**
   * Check the allowlist was built for this ledger (and, for task-bound
   * leaves, for the task about to be created or updated).
   */
  private checkAllowlist(allowlist: AllowlistArtifact, taskId: bigint): void {
    const expected = this.ledger.distributor.getLeafEncoding()
    if (allowlist.leafEncoding !== expected) {
      throw new AllowlistValidationError(`built with ${allowlist.leafEncoding} leaves, ledger uses ${expected}`)
    }
    if (allowlist.leafEncoding === 'task-bound' && allowlist.taskId !== taskId.toString()) {
      throw new AllowlistValidationError(`built for task ${allowlist.taskId}, expected task ${taskId}`)
    }
  }

  // -----------------------
  // Task lifecycle
  // -----------------------

  /**
   * Launch a task gated on `allowlist`
   *
   * Steps:
   * 1. Check the allowlist against the ledger's leaf encoding
   * 2. Check amounts and window (nothing is minted for a launch the ledger
   *    would refuse)
   * 3. Mint any shortfall to the admin and approve the escrow
   * 4. Create the task (pulls the pool into escrow)
   */
  launchTask(params: LaunchTaskParams): LaunchedTask {
    const { distributor } = this.ledger
    const taskId = distributor.getNextTaskId()

    this.logger.info(`=== Launch Task ${taskId}: ${params.name} ===`)

    this.checkAllowlist(params.allowlist, taskId)

    const maxClaims = params.maxClaims ?? BigInt(params.allowlist.leafCount)
    const totalPool = params.totalPool ?? params.rewardAmount * maxClaims
    const now = distributor.now()
    const startTime = params.startTime ?? now
    const endTime = startTime + params.durationSeconds

    assert(params.rewardAmount > 0n && totalPool > 0n && maxClaims > 0n, 'InvalidAmount')
    assert(endTime > startTime && startTime >= now, 'InvalidTimeRange')

    this.logger.info(`Funding pool: ${totalPool}`)
    const created = this.fundFromAdmin(totalPool, () =>
      distributor.createTask(this.admin, {
        name: params.name,
        membershipRoot: params.allowlist.root,
        rewardAmount: params.rewardAmount,
        totalPool,
        maxClaims,
        startTime,
        endTime,
      })
    )

    this.logger.info(`Task ${created} live: ${maxClaims} claims of ${params.rewardAmount}, window ${startTime}..${endTime}`)

    return {
      taskId: created,
      membershipRoot: params.allowlist.root,
      totalPool,
      maxClaims,
      startTime,
      endTime,
    }
  }

  /**
   * Replace a task's membership root. Identities that already claimed stay
   * claimed.
   */
  rotateRoot(taskId: bigint, allowlist: AllowlistArtifact): void {
    validateTaskId(taskId)
    this.checkAllowlist(allowlist, taskId)

    this.ledger.distributor.updateMembershipRoot(this.validator, taskId, allowlist.root)
    this.logger.info(`Task ${taskId} root rotated to ${allowlist.root} (${allowlist.leafCount} identities)`)
  }

  deactivate(taskId: bigint): void {
    this.ledger.distributor.deactivateTask(this.admin, taskId)
    this.logger.info(`Task ${taskId} deactivated`)
  }

  reactivate(taskId: bigint): void {
    this.ledger.distributor.reactivateTask(this.admin, taskId)
    this.logger.info(`Task ${taskId} reactivated`)
  }

  /**
   * Add `amount` to a task's pool, minting any shortfall first
   */
  topUp(taskId: bigint, amount: bigint): bigint {
    validateTaskId(taskId)
    const { distributor } = this.ledger
    distributor.getTask(taskId)
    assert(amount > 0n, 'InvalidAmount')

    this.fundFromAdmin(amount, () => distributor.increaseRewardPool(this.admin, taskId, amount))

    const { totalPool } = distributor.getTask(taskId)
    this.logger.info(`Task ${taskId} pool topped up by ${amount} to ${totalPool}`)
    return totalPool
  }

  /**
   * Return an ended task's unclaimed pool to the admin
   */
  sweep(taskId: bigint): bigint {
    const swept = this.ledger.distributor.withdrawUnclaimed(this.admin, taskId)
    if (swept === 0n) {
      this.logger.info(`Task ${taskId}: nothing left to sweep`)
    } else {
      this.logger.info(`Task ${taskId}: swept ${swept} back to admin`)
    }
    return swept
  }

  // -----------------------
  // Emergency stop
  // -----------------------

  pause(): void {
    this.ledger.distributor.pause(this.admin)
    this.logger.warn('Claims paused')
  }

  unpause(): void {
    this.ledger.distributor.unpause(this.admin)
    this.logger.info('Claims resumed')
  }

  // -----------------------
  // Reporting
  // -----------------------

  summarize(taskId: bigint): TaskSummary {
    const { distributor } = this.ledger
    const task = distributor.getTask(taskId)

    return {
      taskId: task.id,
      name: task.name,
      status: distributor.getTaskStatus(taskId),
      rewardAmount: task.rewardAmount,
      claimCount: task.claimCount,
      maxClaims: task.maxClaims,
      claimedAmount: task.claimedAmount,
      totalPool: task.totalPool,
      remainingRewards: task.totalPool - task.claimedAmount,
      remainingClaims: task.maxClaims - task.claimCount,
    }
  }
}
