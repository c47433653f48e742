import { requireRole, type AccessGuard } from '../access_guard/contract'
import { ClaimLedger, type ClaimReceipt, type ClaimRecord, type PauseSwitch } from '../claim_ledger/contract'
import type { Clock } from '../lib/clock'
import type { EventFilter, LedgerEvent } from '../lib/events'
import type { Logger } from '../lib/logger'
import { LedgerRuntime } from '../lib/runtime'
import { GlobalState } from '../lib/storage'
import type { Hash32 } from '../merkle/hash'
import type { LeafEncoder, LeafEncoding } from '../merkle/leaf'
import type { TokenCustody } from '../reward_token/custody'
import { TaskRegistry, type CreateTaskParams, type TaskRecord, type TaskStatus } from '../task_registry/contract'

/**
 * RewardDistributor: one ledger instance.
 *
 * Owns the shared runtime (storage journal, reentrancy guard, event log), the
 * TaskRegistry, the ClaimLedger and the pause switch, and exposes every ledger
 * operation in one place. All mutations on one instance share a single
 * reentrancy guard, so a custody callback cannot re-enter any of them.
 *
 * NOT responsible for:
 * - token accounting (TokenCustody)
 * - role membership (AccessGuard)
 * - building trees or distributing proofs (sdk)
 */

export interface RewardDistributorOptions {
  access: AccessGuard
  custody: TokenCustody
  clock?: Clock
  logger?: Logger
  leafEncoder?: LeafEncoder
}

export class RewardDistributor implements PauseSwitch {
  private readonly runtime: LedgerRuntime
  private readonly tasks: TaskRegistry
  private readonly claims: ClaimLedger

  private readonly access: AccessGuard
  private readonly custody: TokenCustody
  private readonly paused: GlobalState<boolean>

  constructor(options: RewardDistributorOptions) {
    this.runtime = new LedgerRuntime({ clock: options.clock, logger: options.logger })
    this.access = options.access
    this.custody = options.custody
    this.paused = new GlobalState(this.runtime.journal, false)

    this.tasks = new TaskRegistry(this.runtime, options.access, options.custody)
    this.claims = new ClaimLedger(this.runtime, this.tasks, options.custody, this, {
      leafEncoder: options.leafEncoder,
    })
  }

  // -----------------------
  // Pause switch
  // -----------------------

  isPaused(): boolean {
    return this.paused.value
  }

  /**
   * Emergency stop for claims. Admin-only. Administration stays available.
   */
  pause(caller: string): void {
    this.runtime.mutate('pause', () => {
      requireRole(this.access, caller, 'Admin')
      this.paused.value = true
      this.runtime.events.emit('Paused', { identity: caller }, {})
      this.runtime.logger.info('claims paused')
    })
  }

  unpause(caller: string): void {
    this.runtime.mutate('unpause', () => {
      requireRole(this.access, caller, 'Admin')
      this.paused.value = false
      this.runtime.events.emit('Unpaused', { identity: caller }, {})
      this.runtime.logger.info('claims resumed')
    })
  }

  // -----------------------
  // Administration
  // -----------------------

  createTask(caller: string, params: CreateTaskParams): bigint {
    return this.tasks.createTask(caller, params)
  }

  updateMembershipRoot(caller: string, taskId: bigint, newRoot: Hash32): void {
    this.tasks.updateMembershipRoot(caller, taskId, newRoot)
  }

  deactivateTask(caller: string, taskId: bigint): void {
    this.tasks.deactivateTask(caller, taskId)
  }

  reactivateTask(caller: string, taskId: bigint): void {
    this.tasks.reactivateTask(caller, taskId)
  }

  increaseRewardPool(caller: string, taskId: bigint, amount: bigint): void {
    this.tasks.increaseRewardPool(caller, taskId, amount)
  }

  withdrawUnclaimed(caller: string, taskId: bigint): bigint {
    return this.tasks.withdrawUnclaimed(caller, taskId)
  }

  // -----------------------
  // Claims
  // -----------------------

  claim(claimant: string, taskId: bigint, proof: readonly Hash32[]): ClaimReceipt {
    return this.claims.claim(claimant, taskId, proof)
  }

  isEligible(taskId: bigint, identity: string, proof: readonly Hash32[]): boolean {
    return this.claims.isEligible(taskId, identity, proof)
  }

  hasClaimed(taskId: bigint, identity: string): boolean {
    return this.claims.hasClaimed(taskId, identity)
  }

  getClaim(taskId: bigint, identity: string): ClaimRecord | undefined {
    return this.claims.getClaim(taskId, identity)
  }

  // -----------------------
  // Reads (Public)
  // -----------------------

  getTask(taskId: bigint): TaskRecord {
    return this.tasks.getTask(taskId)
  }

  getTaskCount(): bigint {
    return this.tasks.getTaskCount()
  }

  getNextTaskId(): bigint {
    return this.tasks.getNextTaskId()
  }

  getTaskStatus(taskId: bigint): TaskStatus {
    return this.tasks.getTaskStatus(taskId)
  }

  getRemainingRewards(taskId: bigint): bigint {
    return this.tasks.getRemainingRewards(taskId)
  }

  getRemainingClaims(taskId: bigint): bigint {
    return this.tasks.getRemainingClaims(taskId)
  }

  getTotalDistributed(): bigint {
    return this.claims.getTotalDistributed()
  }

  /** Current ledger time, in unix seconds */
  now(): bigint {
    return this.runtime.now()
  }

  /** Leaf encoding the claim ledger expects proofs against */
  getLeafEncoding(): LeafEncoding {
    return this.claims.leafEncoder.encoding
  }

  /** Funds currently held in escrow across all tasks */
  getBalanceHeld(): bigint {
    return this.custody.balanceHeld()
  }

  getEvents(filter: EventFilter = {}): LedgerEvent[] {
    return this.runtime.events.query(filter)
  }
}
