/**
 * TypedEventBus: typed pub/sub between the driving loop and its observers
 * (CLI progress output, tests).
 *
 * Dispatch is SYNCHRONOUS: handlers run before emit() returns.
 */

import { EventEmitter } from 'node:events'
import type { ProcessEvents } from './event-bus.types.js'

export type { ProcessEvents }

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

export interface TypedEventBus {
  emit<K extends keyof ProcessEvents>(event: K, payload: ProcessEvents[K]): void
  on<K extends keyof ProcessEvents>(event: K, handler: (payload: ProcessEvents[K]) => void): void
  off<K extends keyof ProcessEvents>(event: K, handler: (payload: ProcessEvents[K]) => void): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * @example
 * const bus = createEventBus()
 * bus.on('process:step-completed', ({ stepIndex, taskName }) => {
 *   console.log(`step ${stepIndex + 1} (${taskName}) done`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter = new EventEmitter()

  constructor() {
    // Parallel runs may each attach a progress renderer to a shared bus
    this._emitter.setMaxListeners(100)
  }

  emit<K extends keyof ProcessEvents>(event: K, payload: ProcessEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof ProcessEvents>(event: K, handler: (payload: ProcessEvents[K]) => void): void {
    this._emitter.on(event, handler)
  }

  off<K extends keyof ProcessEvents>(event: K, handler: (payload: ProcessEvents[K]) => void): void {
    this._emitter.off(event, handler)
  }
}

export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
