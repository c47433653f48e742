import { ReentrancyError } from './errors'

/**
 * Single-flight guard shared by every mutating entrypoint of one ledger
 * instance. The flag is set before the body runs (and therefore before any
 * call into custody) and cleared when it returns or throws.
 */
export class ReentrancyGuard {
  private inFlight: string | null = null

  get locked(): boolean {
    return this.inFlight !== null
  }

  nonReentrant<T>(operation: string, body: () => T): T {
    if (this.inFlight !== null) {
      throw new ReentrancyError(operation, this.inFlight)
    }

    this.inFlight = operation
    try {
      return body()
    } finally {
      this.inFlight = null
    }
  }
}
