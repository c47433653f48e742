/**
 * In-process ledger storage.
 *
 * Mirrors the global-state / box-map layout of an on-chain contract:
 * - GlobalState<T>: a single named value
 * - BoxMap<K, V>: keyed records, one box per key
 *
 * Every write is recorded in a StateJournal so an operation can be applied
 * all-or-nothing. Values are replaced, never mutated in place, which keeps the
 * undo entries trivial.
 */

type Undo = () => void

export class StateJournal {
  private readonly frames: Undo[][] = []

  get inTransaction(): boolean {
    return this.frames.length > 0
  }

  record(undo: Undo): void {
    const top = this.frames[this.frames.length - 1]
    if (top) {
      top.push(undo)
    }
  }

  /**
   * Run `body` as one unit. If it throws, every write it made is undone in
   * reverse order and the error is rethrown. Nested units fold into the parent.
   */
  atomic<T>(body: () => T): T {
    const frame: Undo[] = []
    this.frames.push(frame)

    let result: T
    try {
      result = body()
    } catch (error) {
      this.frames.pop()
      for (let i = frame.length - 1; i >= 0; i--) {
        frame[i]()
      }
      throw error
    }

    this.frames.pop()
    const parent = this.frames[this.frames.length - 1]
    if (parent) {
      parent.push(...frame)
    }
    return result
  }
}

export class GlobalState<T> {
  constructor(
    private readonly journal: StateJournal,
    private current: T
  ) {}

  get value(): T {
    return this.current
  }

  set value(next: T) {
    const previous = this.current
    this.journal.record(() => {
      this.current = previous
    })
    this.current = next
  }
}

export class BoxMap<K, V> {
  private readonly boxes = new Map<string, V>()

  constructor(
    private readonly journal: StateJournal,
    private readonly keyPrefix: string,
    private readonly encodeKey: (key: K) => string = String
  ) {}

  private boxName(key: K): string {
    return `${this.keyPrefix}${this.encodeKey(key)}`
  }

  has(key: K): boolean {
    return this.boxes.has(this.boxName(key))
  }

  get(key: K): V | undefined {
    return this.boxes.get(this.boxName(key))
  }

  /**
   * Returns [value, true] when the box exists, [undefined, false] otherwise.
   */
  maybe(key: K): readonly [V, true] | readonly [undefined, false] {
    const name = this.boxName(key)
    const value = this.boxes.get(name)
    return value !== undefined ? [value, true] : [undefined, false]
  }

  set(key: K, value: V): void {
    const name = this.boxName(key)
    const existed = this.boxes.has(name)
    const previous = this.boxes.get(name)

    this.journal.record(() => {
      if (existed && previous !== undefined) {
        this.boxes.set(name, previous)
      } else {
        this.boxes.delete(name)
      }
    })
    this.boxes.set(name, value)
  }

  get size(): number {
    return this.boxes.size
  }

  values(): IterableIterator<V> {
    return this.boxes.values()
  }
}
