import {
  AuditUnavailableError,
  DebateFailedError,
  InvalidQueryError,
  SessionNotFoundError,
  VerdictError,
  toError,
} from '../core/errors.js'
import { maskSecrets } from '../cli/utils/masking.js'

/** Malformed request body (not JSON, wrong field types) */
export class BadRequestError extends VerdictError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'BAD_REQUEST', context)
    this.name = 'BadRequestError'
  }
}

export interface ErrorResponse {
  status: number
  body: Record<string, unknown>
}

/** Map an error to its HTTP status and JSON body; key-shaped substrings are masked */
export function toErrorResponse(value: unknown): ErrorResponse {
  const err = toError(value)

  if (err instanceof DebateFailedError) {
    return {
      status: 502,
      body: {
        error: { code: err.code, message: maskSecrets(err.message) },
        sessionId: err.debate.sessionId,
        state: err.state,
        messages: err.debate.messages,
      },
    }
  }

  const status =
    err instanceof InvalidQueryError || err instanceof BadRequestError
      ? 400
      : err instanceof SessionNotFoundError || err instanceof AuditUnavailableError
        ? 404
        : 500
  const code = err instanceof VerdictError ? err.code : 'INTERNAL_ERROR'
  const message =
    status === 500 && !(err instanceof VerdictError) ? 'Internal server error' : maskSecrets(err.message)
  return { status, body: { error: { code, message } } }
}
