import type { Clock } from './clock'
import type { StateJournal } from './storage'

export type LedgerEventName =
  | 'TaskCreated'
  | 'RewardClaimed'
  | 'TaskDeactivated'
  | 'TaskReactivated'
  | 'MerkleRootUpdated'
  | 'RewardPoolIncreased'
  | 'UnclaimedRewardsWithdrawn'
  | 'Paused'
  | 'Unpaused'

export type EventValue = string | bigint | boolean

export interface LedgerEvent {
  /** Position in the log, starting at 1 */
  readonly seq: number
  readonly name: LedgerEventName
  /** Indexed key */
  readonly taskId?: bigint
  /** Indexed key */
  readonly identity?: string
  readonly data: Readonly<Record<string, EventValue>>
  readonly at: bigint
}

export interface EventKeys {
  taskId?: bigint
  identity?: string
}

export interface EventFilter extends EventKeys {
  name?: LedgerEventName
}

/**
 * Append-only event log. Entries appended inside a journaled operation are
 * dropped again if that operation rolls back.
 */
export class EventLog {
  private readonly entries: LedgerEvent[] = []

  constructor(
    private readonly journal: StateJournal,
    private readonly clock: Clock
  ) {}

  emit(name: LedgerEventName, keys: EventKeys, data: Record<string, EventValue>): LedgerEvent {
    const event: LedgerEvent = Object.freeze({
      seq: this.entries.length + 1,
      name,
      ...keys,
      data: Object.freeze({ ...data }),
      at: this.clock.now(),
    })

    this.entries.push(event)
    this.journal.record(() => {
      this.entries.pop()
    })
    return event
  }

  all(): readonly LedgerEvent[] {
    return [...this.entries]
  }

  query(filter: EventFilter): LedgerEvent[] {
    return this.entries.filter(
      (event) =>
        (filter.name === undefined || event.name === filter.name) &&
        (filter.taskId === undefined || event.taskId === filter.taskId) &&
        (filter.identity === undefined || event.identity === filter.identity)
    )
  }

  get size(): number {
    return this.entries.length
  }
}
