/**
 * Error definitions for the debate engine.
 * Every failure surfaced to a transport carries a stable `code`.
 */

import type { DebateContext } from '../modules/debate/types.js'

/** Plain-object form of an error, safe to log, store and send over the wire */
export interface SerializedError {
  name: string
  message: string
  code?: string
}

/** Base error class for all engine errors */
export class VerdictError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {},
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'VerdictError'
    this.code = code
    this.context = context
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, VerdictError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Query was empty, too long or not text; raised before any phase runs */
export class InvalidQueryError extends VerdictError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'INVALID_QUERY', context)
    this.name = 'InvalidQueryError'
  }
}

/** Rate limiting, overload or a dropped connection; retryable for external agents */
export class AgentTransientError extends VerdictError {
  constructor(
    message: string,
    context: Record<string, unknown> = {},
    cause?: unknown,
    code = 'AGENT_TRANSIENT'
  ) {
    super(message, code, context, cause)
    this.name = 'AgentTransientError'
  }
}

/** An agent call exceeded its time budget */
export class AgentTimeoutError extends AgentTransientError {
  constructor(agentId: string, timeoutMs: number) {
    super(
      `Agent "${agentId}" did not respond within ${String(timeoutMs)}ms`,
      { agentId, timeoutMs },
      undefined,
      'AGENT_TIMEOUT'
    )
    this.name = 'AgentTimeoutError'
  }
}

/** Non-retryable failure reported by an agent backend */
export class AgentCallError extends VerdictError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'AGENT_CALL_FAILED', context, cause)
    this.name = 'AgentCallError'
  }
}

/** An agent returned output that breaks its contract (e.g. empty text) */
export class AgentContractError extends VerdictError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'AGENT_CONTRACT_VIOLATION', context)
    this.name = 'AgentContractError'
  }
}

/** A phase gave up after exhausting its attempts */
export class PhaseFailedError extends VerdictError {
  public readonly state: string
  public readonly attempts: number

  constructor(state: string, participant: string, attempts: number, cause: Error) {
    super(
      `Phase ${state} (${participant}) failed after ${String(attempts)} attempt(s): ${cause.message}`,
      'PHASE_FAILED',
      { state, participant, attempts },
      cause
    )
    this.name = 'PhaseFailedError'
    this.state = state
    this.attempts = attempts
  }
}

/**
 * The debate was aborted. The partial context is attached for diagnostics;
 * its status is `failed` and it never reaches COMPLETE.
 */
export class DebateFailedError extends VerdictError {
  public readonly debate: DebateContext
  public readonly state: string

  constructor(debate: DebateContext, state: string, cause: Error) {
    super(
      `Debate ${debate.sessionId} failed in state ${state}: ${cause.message}`,
      'DEBATE_FAILED',
      { sessionId: debate.sessionId, state, messagesRecorded: debate.messages.length },
      cause
    )
    this.name = 'DebateFailedError'
    this.debate = debate
    this.state = state
  }
}

/** The ledger rejected or failed to record an audit; the debate itself stays valid */
export class AuditFailedError extends VerdictError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'AUDIT_FAILED', context, cause)
    this.name = 'AuditFailedError'
  }
}

/** The session exists but has no completed audit to report on */
export class AuditUnavailableError extends VerdictError {
  constructor(sessionId: string, status: string) {
    super(`No completed audit for session ${sessionId} (status: ${status})`, 'AUDIT_UNAVAILABLE', {
      sessionId,
      status,
    })
    this.name = 'AuditUnavailableError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends VerdictError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** A debate topology references unknown participants or unwritten slots */
export class TopologyError extends VerdictError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'INVALID_TOPOLOGY', context)
    this.name = 'TopologyError'
  }
}

export class SessionNotFoundError extends VerdictError {
  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, 'SESSION_NOT_FOUND', { sessionId })
    this.name = 'SessionNotFoundError'
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Coerce any thrown value into an Error instance */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}

export function serializeError(value: unknown): SerializedError {
  const err = toError(value)
  if (err instanceof VerdictError) {
    return { name: err.name, message: err.message, code: err.code }
  }
  return { name: err.name, message: err.message }
}

/** Transient failures are the only ones an external agent call may retry */
export function isTransientError(value: unknown): boolean {
  return value instanceof AgentTransientError
}
