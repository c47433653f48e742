import { systemClock, type Clock } from './clock'
import { EventLog } from './events'
import { silentLogger, type Logger } from './logger'
import { ReentrancyGuard } from './reentrancy'
import { StateJournal } from './storage'

export interface LedgerRuntimeOptions {
  clock?: Clock
  logger?: Logger
}

/**
 * Execution context shared by the components of one ledger instance: storage
 * journal, reentrancy guard, event log, clock and logger.
 */
export class LedgerRuntime {
  readonly journal = new StateJournal()
  readonly guard = new ReentrancyGuard()
  readonly events: EventLog
  readonly clock: Clock
  readonly logger: Logger

  constructor(options: LedgerRuntimeOptions = {}) {
    this.clock = options.clock ?? systemClock
    this.logger = options.logger ?? silentLogger
    this.events = new EventLog(this.journal, this.clock)
  }

  now(): bigint {
    return this.clock.now()
  }

  /**
   * Run a state-mutating operation: single-flight, all-or-nothing.
   */
  mutate<T>(operation: string, body: () => T): T {
    return this.guard.nonReentrant(operation, () => this.journal.atomic(body))
  }
}
