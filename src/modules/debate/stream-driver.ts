/**
 * Streaming driver: the same engine walk as `DebateEngine.run()`, surfaced
 * incrementally with cosmetic pacing between states and messages.
 */

import type { SessionId } from '../../core/types.js'
import { interruptibleSleep } from '../../utils/helpers.js'
import type { PacingSettings } from '../config/config-schema.js'
import type { DebateEngine } from './debate-engine.js'
import type { DebateContext, StreamItem } from './types.js'

export interface PacingOptions {
  /** Pause before each non-initial state */
  thinkingMs: number
  /** Pause after each yielded message */
  messageGapMs: number
  /** Aborting skips every remaining pause; the debate carries on */
  skipSignal?: AbortSignal
  /** Replaces the timer-based pause (tests) */
  delay?: (ms: number) => Promise<void>
}

export const NO_PACING: PacingOptions = { thinkingMs: 0, messageGapMs: 0 }

export function pacingFromSettings(settings: PacingSettings): PacingOptions {
  if (!settings.enabled) return NO_PACING
  return { thinkingMs: settings.thinking_ms, messageGapMs: settings.message_gap_ms }
}

export interface StreamOptions {
  sessionId?: SessionId
  /** Cancels the debate itself */
  signal?: AbortSignal
  pacing?: PacingOptions
}

/**
 * Validate `query`, then stream the debate.
 * @throws {InvalidQueryError} on the first `next()`, before any phase runs
 */
export async function* streamDebate(
  engine: DebateEngine,
  query: unknown,
  options: StreamOptions = {}
): AsyncGenerator<StreamItem, void, undefined> {
  const context = engine.createContext(query, options.sessionId)
  yield* streamContext(engine, context, options)
}

/**
 * Stream an already-created context: one `message` item per appended
 * message, in append order, then a single `result` item.
 */
export async function* streamContext(
  engine: DebateEngine,
  context: DebateContext,
  options: Omit<StreamOptions, 'sessionId'> = {}
): AsyncGenerator<StreamItem, void, undefined> {
  const pacing = options.pacing ?? NO_PACING
  const { signal } = options

  const wait = async (ms: number): Promise<void> => {
    if (ms <= 0 || pacing.skipSignal?.aborted === true) return
    if (pacing.delay !== undefined) {
      await pacing.delay(ms)
      return
    }
    await interruptibleSleep(ms, { skipSignal: pacing.skipSignal, abortSignal: signal })
  }

  const steps = engine.execute(context, {
    signal,
    beforeState: () => wait(pacing.thinkingMs),
  })
  for await (const step of steps) {
    for (const message of step.messages) {
      yield { kind: 'message', message }
      await wait(pacing.messageGapMs)
    }
  }
  yield { kind: 'result', context }
}
