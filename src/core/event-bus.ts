/**
 * TypedEventBus: synchronous pub/sub over Node's EventEmitter, typed by the
 * OrchestratorEvents map.
 *
 * Handlers run inside emit(); a handler that needs async work schedules it
 * itself. The bus imports nothing but the event map, so any module can take
 * one without creating a cycle.
 */

import { EventEmitter } from 'node:events'
import type { OrchestratorEvents } from './event-bus.types.js'

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

export type EventHandler<K extends keyof OrchestratorEvents> = (payload: OrchestratorEvents[K]) => void

export interface TypedEventBus {
  /** Run every handler of `event` before returning */
  emit<K extends keyof OrchestratorEvents>(event: K, payload: OrchestratorEvents[K]): void

  /**
   * Subscribe to an event.
   * @returns a function that removes this subscription
   */
  on<K extends keyof OrchestratorEvents>(event: K, handler: EventHandler<K>): () => void

  /** Remove a handler; a no-op when it was never registered */
  off<K extends keyof OrchestratorEvents>(event: K, handler: EventHandler<K>): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * @example
 * const bus = new TypedEventBusImpl()
 * const stop = bus.on('block:finished', ({ blockId, status }) => {
 *   console.log(`Block ${blockId} finished as ${status}`)
 * })
 * bus.emit('block:finished', { blockId: 'auth', status: 'completed', reason: 'validation passed' })
 * stop()
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter = new EventEmitter()

  constructor() {
    this._emitter.setMaxListeners(100)
  }

  emit<K extends keyof OrchestratorEvents>(event: K, payload: OrchestratorEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof OrchestratorEvents>(event: K, handler: EventHandler<K>): () => void {
    // EventEmitter passes arguments as rest params; cast to satisfy TypeScript
    this._emitter.on(event, handler as (arg: unknown) => void)
    return () => this.off(event, handler)
  }

  off<K extends keyof OrchestratorEvents>(event: K, handler: EventHandler<K>): void {
    this._emitter.off(event, handler as (arg: unknown) => void)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new TypedEventBus instance.
 *
 * @example
 * const bus = createEventBus()
 */
export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
