/**
 * MessageChannel: unbounded multi-producer, single-consumer queue.
 *
 * Producers call send(); exactly one consumer awaits receive(). Messages are
 * delivered in send order.
 */

export class MessageChannel<T> {
  private readonly _buffer: T[] = []
  private _waiter: ((message: T) => void) | null = null

  send(message: T): void {
    const waiter = this._waiter
    if (waiter !== null) {
      this._waiter = null
      waiter(message)
      return
    }
    this._buffer.push(message)
  }

  /**
   * Wait for the next message.
   * @throws {Error} if another receive() is already pending
   */
  receive(): Promise<T> {
    if (this._buffer.length > 0) {
      const next = this._buffer.shift()
      if (next !== undefined) return Promise.resolve(next)
    }
    if (this._waiter !== null) {
      throw new Error('MessageChannel supports a single consumer; receive() is already pending')
    }
    return new Promise((resolve) => {
      this._waiter = resolve
    })
  }

  /** Number of buffered, undelivered messages */
  get size(): number {
    return this._buffer.length
  }
}
