/**
 * PhaseInvoker: runs one agent call under the failure policy for its backend.
 *
 * External agents: per-attempt timeout, bounded retries with exponential
 * backoff, transient failures only. Scripted agents: one attempt, no
 * timeout. Either way an exhausted call surfaces as PhaseFailedError.
 */

import type pino from 'pino'
import {
  AgentTimeoutError,
  PhaseFailedError,
  isTransientError,
  toError,
} from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { SessionId } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { withRetry, withTimeout } from '../../utils/helpers.js'
import type { AgentIdentity } from '../agents/types.js'

const defaultLogger = createLogger('phase-invoker')

export interface InvocationPolicy {
  /** Total attempts for external agents, first call included */
  maxAttempts: number
  baseDelayMs: number
  /** Per-attempt deadline for external agents */
  timeoutMs: number
}

export interface PhaseCall<T> {
  sessionId: SessionId
  state: string
  agent: AgentIdentity
  /** Debate-level cancellation */
  signal?: AbortSignal
  call: (signal: AbortSignal | undefined) => Promise<T>
}

export interface PhaseInvokerOptions {
  policy: InvocationPolicy
  eventBus?: TypedEventBus
  logger?: pino.Logger
}

export class PhaseInvoker {
  private readonly _policy: InvocationPolicy
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _logger: pino.Logger

  constructor(options: PhaseInvokerOptions) {
    this._policy = options.policy
    this._eventBus = options.eventBus
    this._logger = options.logger ?? defaultLogger
  }

  get policy(): InvocationPolicy {
    return this._policy
  }

  async invoke<T>(request: PhaseCall<T>): Promise<T> {
    return request.agent.backend === 'external'
      ? this._invokeExternal(request)
      : this._invokeOnce(request)
  }

  private async _invokeOnce<T>(request: PhaseCall<T>): Promise<T> {
    try {
      return await request.call(request.signal)
    } catch (err) {
      throw new PhaseFailedError(request.state, request.agent.id, 1, toError(err))
    }
  }

  private async _invokeExternal<T>(request: PhaseCall<T>): Promise<T> {
    const { agent, state, sessionId, signal } = request
    const { maxAttempts, baseDelayMs, timeoutMs } = this._policy
    let attempts = 0

    try {
      return await withRetry(
        (attempt) => {
          attempts = attempt
          return withTimeout((callSignal) => request.call(callSignal), timeoutMs, {
            signal,
            onTimeout: () => new AgentTimeoutError(agent.id, timeoutMs),
          })
        },
        {
          maxAttempts,
          baseDelayMs,
          signal,
          shouldRetry: (error) => signal?.aborted !== true && isTransientError(error),
          onRetry: (error, attempt, delayMs) => {
            this._logger.warn(
              { sessionId, state, participant: agent.id, attempt, delayMs, err: error.message },
              'Transient agent failure, retrying'
            )
            this._eventBus?.emit('debate:retry', {
              sessionId,
              state,
              participant: agent.id,
              attempt,
              delayMs,
              error: error.message,
            })
          },
        }
      )
    } catch (err) {
      throw new PhaseFailedError(state, agent.id, Math.max(attempts, 1), toError(err))
    }
  }
}
