/**
 * Pause gate: callers await wait() before starting new work; it resolves
 * immediately while open and holds callers while closed.
 */

export class PauseGate {
  private _closed: { promise: Promise<void>; resolve: () => void } | null = null

  get isClosed(): boolean {
    return this._closed !== null
  }

  /** Close the gate. No-op if already closed. */
  close(): void {
    if (this._closed !== null) return
    let resolve!: () => void
    const promise = new Promise<void>((res) => {
      resolve = res
    })
    this._closed = { promise, resolve }
  }

  /** Open the gate and release every waiter. No-op if already open. */
  open(): void {
    const closed = this._closed
    if (closed === null) return
    this._closed = null
    closed.resolve()
  }

  async wait(): Promise<void> {
    while (this._closed !== null) {
      await this._closed.promise
    }
  }
}
