/**
 * Async mutual exclusion for critical sections that span awaits.
 *
 * Waiters are released strictly in FIFO order.
 */

export class Mutex {
  private _locked = false
  private readonly _queue: Array<() => void> = []

  /** Whether a holder currently owns the lock */
  get isLocked(): boolean {
    return this._locked
  }

  /**
   * Acquire the lock. Resolves with a release function that must be called
   * exactly once.
   */
  async acquire(): Promise<() => void> {
    if (!this._locked) {
      this._locked = true
      return this._makeRelease()
    }

    return new Promise((resolve) => {
      this._queue.push(() => {
        resolve(this._makeRelease())
      })
    })
  }

  /** Run `fn` while holding the lock */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire()
    try {
      return await fn()
    } finally {
      release()
    }
  }

  private _makeRelease(): () => void {
    let released = false
    return () => {
      if (released) return
      released = true
      const next = this._queue.shift()
      if (next !== undefined) {
        // Ownership passes directly to the next waiter
        next()
      } else {
        this._locked = false
      }
    }
  }
}
