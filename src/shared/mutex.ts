// src/shared/mutex.ts — Promise-chain locks (whole-store and per-key)

// ---------------------------------------------------------------------------
// AsyncMutex
// ---------------------------------------------------------------------------

/** Single lock. Callers run in arrival order. */
export class AsyncMutex {
  private chain: Promise<void> = Promise.resolve()

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release = () => {}
    const gate = new Promise<void>((resolve) => { release = resolve })

    const prev = this.chain
    this.chain = prev.then(() => gate)

    await prev
    try {
      return await fn()
    } finally {
      release()
    }
  }
}

// ---------------------------------------------------------------------------
// KeyedMutex
// ---------------------------------------------------------------------------

/**
 * One lock per key. Work on different keys never waits on each other; work on
 * the same key runs strictly one at a time, in arrival order.
 *
 * A key's entry is dropped once its last holder releases, so the map only
 * holds keys with work in flight.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>()

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let release = () => {}
    const gate = new Promise<void>((resolve) => { release = resolve })

    const prev = this.tails.get(key) ?? Promise.resolve()
    const tail = prev.then(() => gate)
    this.tails.set(key, tail)

    await prev
    try {
      return await fn()
    } finally {
      release()
      if (this.tails.get(key) === tail) this.tails.delete(key)
    }
  }

  /** Number of keys currently held or waited on. */
  get activeKeys(): number {
    return this.tails.size
  }
}
