/**
 * Keyed Mutex
 *
 * One FIFO lock per key. Holders of different keys never wait on each other.
 */

export type Release = () => void

export class KeyedMutex<K = string> {
  private tails = new Map<K, Promise<void>>()
  private held = new Set<K>()
  private waiting = new Map<K, number>()

  /**
   * Wait for the key and return its release function.
   * Waiters are served in arrival order. Releasing twice is a no-op.
   */
  async acquire(key: K): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve()

    let unlock = () => {}
    const current = new Promise<void>((resolve) => {
      unlock = resolve
    })
    const tail = previous.then(() => current)
    this.tails.set(key, tail)

    this.waiting.set(key, (this.waiting.get(key) ?? 0) + 1)
    await previous
    this.decrementWaiting(key)
    this.held.add(key)

    let released = false
    return () => {
      if (released) return
      released = true
      this.held.delete(key)
      if (this.tails.get(key) === tail) this.tails.delete(key)
      unlock()
    }
  }

  /**
   * Run `fn` while holding the key.
   */
  async runExclusive<T>(key: K, fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire(key)
    try {
      return await fn()
    } finally {
      release()
    }
  }

  /** True while the key is held or has waiters. */
  isLocked(key: K): boolean {
    return this.tails.has(key)
  }

  /** Number of keys currently held. */
  get heldCount(): number {
    return this.held.size
  }

  /** Number of acquisitions waiting across all keys. */
  get waitingCount(): number {
    let total = 0
    for (const count of this.waiting.values()) total += count
    return total
  }

  heldKeys(): K[] {
    return [...this.held]
  }

  private decrementWaiting(key: K): void {
    const count = (this.waiting.get(key) ?? 1) - 1
    if (count <= 0) {
      this.waiting.delete(key)
    } else {
      this.waiting.set(key, count)
    }
  }
}
