import { requireRole, type AccessGuard } from '../access_guard/contract'
import { assert } from '../lib/errors'
import type { LedgerRuntime } from '../lib/runtime'
import { BoxMap, GlobalState } from '../lib/storage'
import { normalizeHash32, type Hash32 } from '../merkle/hash'
import type { TokenCustody } from '../reward_token/custody'

/**
 * TaskRegistry: reward campaigns and their lifecycle.
 *
 * Lifecycle (per task):
 *   created (active) ⇄ inactive, and `ended` once now > endTime.
 *   `scheduled` is reported while now < startTime.
 *   Only `ended` is derived; `active` is the stored flag.
 *
 * Mutable after creation: membershipRoot, totalPool, active, and the claim
 * counters. The counters move only through the ClaimRecorder, which is issued
 * once to the ClaimLedger sharing this registry. Tasks are never deleted.
 *
 * Invariants:
 * - rewardAmount > 0, maxClaims > 0
 * - claimedAmount <= totalPool
 * - claimCount <= maxClaims
 * - claimedAmount == rewardAmount * claimCount
 */

export interface TaskRecord {
  readonly id: bigint
  readonly name: string
  readonly membershipRoot: Hash32
  readonly rewardAmount: bigint
  readonly totalPool: bigint
  readonly claimedAmount: bigint
  readonly maxClaims: bigint
  readonly claimCount: bigint
  readonly startTime: bigint
  readonly endTime: bigint
  readonly active: boolean
  readonly creator: string
  readonly createdAt: bigint
}

export interface CreateTaskParams {
  name: string
  membershipRoot: Hash32
  rewardAmount: bigint
  totalPool: bigint
  maxClaims: bigint
  startTime: bigint
  endTime: bigint
}

export type TaskStatus = 'scheduled' | 'active' | 'inactive' | 'ended'

/** Records one payout against a task and returns the updated record */
export type ClaimRecorder = (taskId: bigint) => TaskRecord

export class TaskRegistry {
  // Next task id
  private readonly taskCounter: GlobalState<bigint>
  private readonly tasks: BoxMap<bigint, TaskRecord>
  private recorderIssued = false

  constructor(
    private readonly runtime: LedgerRuntime,
    private readonly access: AccessGuard,
    private readonly custody: TokenCustody
  ) {
    this.taskCounter = new GlobalState(runtime.journal, 1n)
    this.tasks = new BoxMap(runtime.journal, 'task:')
  }

  private store(task: TaskRecord): TaskRecord {
    const frozen = Object.freeze(task)
    this.tasks.set(task.id, frozen)
    return frozen
  }

  private requireTask(taskId: bigint): TaskRecord {
    const task = this.tasks.get(taskId)
    assert(task !== undefined, 'TaskNotFound', `task ${taskId}`)
    return task
  }

  // -----------------------
  // Administration
  // -----------------------

  /**
   * Create a task and pull its pool from the caller into escrow.
   * Admin-only. The caller must have approved custody for `totalPool`.
   *
   * @returns the new task id
   */
  createTask(caller: string, params: CreateTaskParams): bigint {
    return this.runtime.mutate('createTask', () => {
      requireRole(this.access, caller, 'Admin')

      assert(params.rewardAmount > 0n && params.totalPool > 0n && params.maxClaims > 0n, 'InvalidAmount')

      const now = this.runtime.now()
      assert(params.endTime > params.startTime && params.startTime >= now, 'InvalidTimeRange')

      const membershipRoot = normalizeHash32(params.membershipRoot)

      const taskId = this.taskCounter.value
      this.taskCounter.value = taskId + 1n

      this.store({
        id: taskId,
        name: params.name,
        membershipRoot,
        rewardAmount: params.rewardAmount,
        totalPool: params.totalPool,
        claimedAmount: 0n,
        maxClaims: params.maxClaims,
        claimCount: 0n,
        startTime: params.startTime,
        endTime: params.endTime,
        active: true,
        creator: caller,
        createdAt: now,
      })

      this.custody.deposit(caller, params.totalPool)

      this.runtime.events.emit(
        'TaskCreated',
        { taskId, identity: caller },
        {
          name: params.name,
          membershipRoot,
          rewardAmount: params.rewardAmount,
          totalPool: params.totalPool,
          maxClaims: params.maxClaims,
          startTime: params.startTime,
          endTime: params.endTime,
        }
      )
      this.runtime.logger.debug(`task ${taskId} created`, { name: params.name, pool: params.totalPool })

      return taskId
    })
  }

  /**
   * Replace the membership root. Validator-only.
   * Existing claim records are kept: identities already paid stay paid.
   */
  updateMembershipRoot(caller: string, taskId: bigint, newRoot: Hash32): void {
    this.runtime.mutate('updateMembershipRoot', () => {
      requireRole(this.access, caller, 'Validator')
      const task = this.requireTask(taskId)
      const membershipRoot = normalizeHash32(newRoot)

      this.store({ ...task, membershipRoot })

      this.runtime.events.emit(
        'MerkleRootUpdated',
        { taskId },
        { oldRoot: task.membershipRoot, newRoot: membershipRoot, updatedBy: caller }
      )
      this.runtime.logger.debug(`task ${taskId} root updated`)
    })
  }

  deactivateTask(caller: string, taskId: bigint): void {
    this.setActive(caller, taskId, false)
  }

  reactivateTask(caller: string, taskId: bigint): void {
    this.setActive(caller, taskId, true)
  }

  private setActive(caller: string, taskId: bigint, active: boolean): void {
    this.runtime.mutate(active ? 'reactivateTask' : 'deactivateTask', () => {
      requireRole(this.access, caller, 'Admin')
      const task = this.requireTask(taskId)

      this.store({ ...task, active })

      this.runtime.events.emit(active ? 'TaskReactivated' : 'TaskDeactivated', { taskId }, { by: caller })
      this.runtime.logger.debug(`task ${taskId} ${active ? 'reactivated' : 'deactivated'}`)
    })
  }

  /**
   * Top up a task's pool from the caller. Admin-only.
   */
  increaseRewardPool(caller: string, taskId: bigint, amount: bigint): void {
    this.runtime.mutate('increaseRewardPool', () => {
      requireRole(this.access, caller, 'Admin')
      const task = this.requireTask(taskId)
      assert(amount > 0n, 'InvalidAmount')

      const totalPool = task.totalPool + amount
      this.store({ ...task, totalPool })

      this.custody.deposit(caller, amount)

      this.runtime.events.emit('RewardPoolIncreased', { taskId, identity: caller }, { amount, totalPool })
      this.runtime.logger.debug(`task ${taskId} pool increased by ${amount}`)
    })
  }

  /**
   * Return the unclaimed part of an ended task's pool to the caller.
   * Admin-only. A repeat call finds nothing left and transfers nothing.
   *
   * @returns amount paid out (0 when nothing was left)
   */
  withdrawUnclaimed(caller: string, taskId: bigint): bigint {
    return this.runtime.mutate('withdrawUnclaimed', () => {
      requireRole(this.access, caller, 'Admin')
      const task = this.requireTask(taskId)
      assert(this.runtime.now() > task.endTime, 'TaskNotEnded')

      const unclaimed = task.totalPool - task.claimedAmount
      if (unclaimed <= 0n) {
        return 0n
      }

      this.store({ ...task, totalPool: task.claimedAmount })
      this.custody.pay(caller, unclaimed)

      this.runtime.events.emit('UnclaimedRewardsWithdrawn', { taskId, identity: caller }, { amount: unclaimed })
      this.runtime.logger.debug(`task ${taskId} swept ${unclaimed}`)

      return unclaimed
    })
  }

  /**
   * Hand out the claim counter update. Only one ClaimLedger may hold it, so
   * the second request fails.
   */
  issueClaimRecorder(): ClaimRecorder {
    if (this.recorderIssued) {
      throw new Error('TaskRegistry: claim recorder already issued')
    }
    this.recorderIssued = true
    return (taskId) => this.recordClaim(taskId)
  }

  private recordClaim(taskId: bigint): TaskRecord {
    const task = this.requireTask(taskId)
    return this.store({
      ...task,
      claimedAmount: task.claimedAmount + task.rewardAmount,
      claimCount: task.claimCount + 1n,
    })
  }

  // -----------------------
  // Reads
  // -----------------------

  findTask(taskId: bigint): TaskRecord | undefined {
    return this.tasks.get(taskId)
  }

  getTask(taskId: bigint): TaskRecord {
    return this.requireTask(taskId)
  }

  /** Number of tasks created so far */
  getTaskCount(): bigint {
    return this.taskCounter.value - 1n
  }

  /** Id the next createTask call will assign */
  getNextTaskId(): bigint {
    return this.taskCounter.value
  }

  getRemainingRewards(taskId: bigint): bigint {
    const task = this.requireTask(taskId)
    return task.totalPool - task.claimedAmount
  }

  getRemainingClaims(taskId: bigint): bigint {
    const task = this.requireTask(taskId)
    return task.maxClaims - task.claimCount
  }

  getTaskStatus(taskId: bigint): TaskStatus {
    const task = this.requireTask(taskId)
    const now = this.runtime.now()

    if (now > task.endTime) return 'ended'
    if (!task.active) return 'inactive'
    if (now < task.startTime) return 'scheduled'
    return 'active'
  }
}
