/**
 * StreamingFormatter: NDJSON event emitter for `verdict debate --output-format json`.
 *
 * Each line follows: {"event":"<name>","timestamp":"<ISO8601>","data":{...}}
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { DebateEvents } from '../../core/event-bus.types.js'

export type Writer = (line: string) => void

const stdoutWriter: Writer = (line) => {
  process.stdout.write(line)
}

/**
 * Write a single NDJSON event.
 *
 * @param event - Event name (e.g. "debate:message", "debate:result")
 */
export function emitEvent(event: string, data: object, write: Writer = stdoutWriter): void {
  const line = JSON.stringify({
    event,
    timestamp: new Date().toISOString(),
    data,
  })
  write(line + '\n')
}

const FORWARDED_EVENTS = [
  'debate:started',
  'debate:phase-started',
  'debate:message',
  'debate:retry',
  'debate:completed',
  'debate:failed',
  'audit:recording',
  'audit:completed',
  'audit:failed',
] as const satisfies readonly (keyof DebateEvents)[]

/**
 * Mirror bus events as NDJSON lines until the returned function is called.
 */
export function forwardBusEvents(bus: TypedEventBus, write: Writer = stdoutWriter): () => void {
  const unsubscribers = FORWARDED_EVENTS.map((name) => subscribe(bus, name, write))
  return () => {
    for (const unsubscribe of unsubscribers) unsubscribe()
  }
}

function subscribe<K extends keyof DebateEvents>(bus: TypedEventBus, name: K, write: Writer): () => void {
  return bus.on(name, (payload) => {
    emitEvent(name, payload, write)
  })
}
