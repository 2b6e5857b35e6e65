/**
 * TypedEventBus: synchronous typed pub/sub between the engine, the audit
 * recorder, the session store and the transports.
 *
 * Handlers run before emit() returns. A handler that throws is logged and
 * skipped; the emitter and the remaining handlers carry on.
 */

import { EventEmitter } from 'node:events'
import { createLogger } from '../utils/logger.js'
import type { DebateEvents } from './event-bus.types.js'

const logger = createLogger('event-bus')

export type EventHandler<K extends keyof DebateEvents> = (payload: DebateEvents[K]) => void

export interface TypedEventBus {
  emit<K extends keyof DebateEvents>(event: K, payload: DebateEvents[K]): void

  /** @returns a function that removes the handler */
  on<K extends keyof DebateEvents>(event: K, handler: EventHandler<K>): () => void

  /** No-op for a handler that was never registered */
  off<K extends keyof DebateEvents>(event: K, handler: EventHandler<K>): void

  listenerCount(event: keyof DebateEvents): number
}

/**
 * @example
 * const bus = new TypedEventBusImpl()
 * const stop = bus.on('debate:message', ({ sessionId, message }) => {
 *   process.stdout.write(`${sessionId}: ${message.agent}\n`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter = new EventEmitter()

  constructor() {
    // A server attaches a forwarder and a logger per concurrent stream
    this._emitter.setMaxListeners(100)
  }

  emit<K extends keyof DebateEvents>(event: K, payload: DebateEvents[K]): void {
    for (const listener of this._emitter.listeners(event)) {
      try {
        listener(payload)
      } catch (err) {
        logger.error({ event, err: err instanceof Error ? err.message : String(err) }, 'Event handler threw')
      }
    }
  }

  on<K extends keyof DebateEvents>(event: K, handler: EventHandler<K>): () => void {
    this._emitter.on(event, handler)
    return () => {
      this.off(event, handler)
    }
  }

  off<K extends keyof DebateEvents>(event: K, handler: EventHandler<K>): void {
    this._emitter.off(event, handler)
  }

  listenerCount(event: keyof DebateEvents): number {
    return this._emitter.listenerCount(event)
  }
}

export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
