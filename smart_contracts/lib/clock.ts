/**
 * Time source for the ledger, in unix seconds.
 */
export interface Clock {
  now(): bigint
}

export const systemClock: Clock = {
  now: () => BigInt(Math.floor(Date.now() / 1000)),
}

/**
 * Clock that only moves when told to. Used by tests and the demo flow.
 */
export class ManualClock implements Clock {
  constructor(private current: bigint) {}

  now(): bigint {
    return this.current
  }

  set(timestamp: bigint): void {
    this.current = timestamp
  }

  advance(seconds: bigint): bigint {
    this.current += seconds
    return this.current
  }
}

export const ONE_DAY = 86_400n
