/**
 * DebateEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "debate:message", "audit:completed")
 */

import type { RiskLevel, SessionId, TopologyName } from './types.js'
import type { DebateMessage } from '../modules/debate/types.js'

export interface DebateEvents {
  // -------------------------------------------------------------------------
  // Debate lifecycle
  // -------------------------------------------------------------------------

  /** A debate context was created and the machine left INIT */
  'debate:started': { sessionId: SessionId; topology: TopologyName; query: string }

  /** The engine entered a non-initial state */
  'debate:phase-started': { sessionId: SessionId; state: string }

  /** A message was appended to the transcript */
  'debate:message': { sessionId: SessionId; message: DebateMessage }

  /** An external agent call failed transiently and will be retried */
  'debate:retry': {
    sessionId: SessionId
    state: string
    participant: string
    attempt: number
    delayMs: number
    error: string
  }

  /** The machine reached COMPLETE */
  'debate:completed': { sessionId: SessionId; messageCount: number; riskLevel: RiskLevel }

  /** A phase failure aborted the debate */
  'debate:failed': { sessionId: SessionId; state: string; code: string; error: string }

  // -------------------------------------------------------------------------
  // Audit
  // -------------------------------------------------------------------------

  'audit:recording': { sessionId: SessionId }

  'audit:completed': { sessionId: SessionId; contentHash: string; transactionId: string }

  'audit:failed': { sessionId: SessionId; error: string }

  // -------------------------------------------------------------------------
  // Sessions
  // -------------------------------------------------------------------------

  'session:evicted': { sessionId: SessionId; reason: 'expired' | 'capacity' }
}
