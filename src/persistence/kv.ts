// src/persistence/kv.ts — Key-value store contract and in-memory implementation

/**
 * Returning `undefined` from an updater leaves the record as it was.
 * Throwing from an updater aborts the update and propagates the error.
 */
export type Updater<T> = (current: T | undefined) => T | undefined

/**
 * Durable key-value abstraction the presence stores are written against.
 *
 * `insertIfAbsent` and `update` are atomic with respect to every other call on
 * the same key.
 */
export interface KeyValueStore<T> {
  get(key: string): Promise<T | undefined>
  entries(): Promise<Array<[string, T]>>
  /** Returns false (and writes nothing) when the key already exists. */
  insertIfAbsent(key: string, value: T): Promise<boolean>
  /** Returns the record as stored after the call. */
  update(key: string, fn: Updater<T>): Promise<T | undefined>
}

// ---------------------------------------------------------------------------
// MemoryKeyValueStore
// ---------------------------------------------------------------------------

/** Process-local store. Every method completes without yielding mid-update. */
export class MemoryKeyValueStore<T> implements KeyValueStore<T> {
  private readonly records = new Map<string, T>()

  constructor(seed?: Iterable<[string, T]>) {
    if (seed) {
      for (const [key, value] of seed) this.records.set(key, value)
    }
  }

  async get(key: string): Promise<T | undefined> {
    return this.records.get(key)
  }

  async entries(): Promise<Array<[string, T]>> {
    return Array.from(this.records)
  }

  async insertIfAbsent(key: string, value: T): Promise<boolean> {
    if (this.records.has(key)) return false
    this.records.set(key, value)
    return true
  }

  async update(key: string, fn: Updater<T>): Promise<T | undefined> {
    const current = this.records.get(key)
    const next = fn(current)
    if (next === undefined) return current
    this.records.set(key, next)
    return next
  }
}
