import Anthropic from '@anthropic-ai/sdk'
import { AgentCallError, AgentTransientError, VerdictError } from '../../../core/errors.js'

/**
 * Translate SDK failures into the engine's taxonomy. Rate limits, overload,
 * server errors and connection problems are transient; everything else is not.
 */
export function mapAnthropicError(err: unknown, agentId: string): VerdictError {
  if (err instanceof VerdictError) return err

  const context = { agentId }
  if (err instanceof Anthropic.APIConnectionError) {
    // Includes APIConnectionTimeoutError
    return new AgentTransientError(`Connection to model backend failed: ${err.message}`, context, err)
  }
  if (err instanceof Anthropic.RateLimitError) {
    return new AgentTransientError('Model backend rate limit reached', { ...context, status: 429 }, err)
  }
  if (err instanceof Anthropic.APIError) {
    const status = err.status
    if (typeof status === 'number' && (status >= 500 || status === 529)) {
      return new AgentTransientError(`Model backend unavailable (${String(status)})`, { ...context, status }, err)
    }
    return new AgentCallError(`Model backend rejected the request: ${err.message}`, { ...context, status }, err)
  }

  const message = err instanceof Error ? err.message : String(err)
  return new AgentCallError(`Agent call failed: ${message}`, context, err)
}
