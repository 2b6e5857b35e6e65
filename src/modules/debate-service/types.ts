/**
 * Request, outcome and event types exposed by the debate service.
 */

import type { SerializedError } from '../../core/errors.js'
import type { RiskLevel, SessionId, TopologyName } from '../../core/types.js'
import type { LedgerReceipt } from '../audit/types.js'
import type { DebateContext, DebateMessage, DebateStatus } from '../debate/types.js'
import type { PacingOptions } from '../debate/stream-driver.js'
import type { SynthesisResult } from '../decision/types.js'

export interface DebateRequest {
  query: unknown
  topology?: TopologyName
  /** Overrides `audit.enabled` */
  audit?: boolean
  signal?: AbortSignal
}

export interface StreamRequest extends DebateRequest {
  /** Overrides the configured pacing */
  pacing?: PacingOptions
}

/** What transports report about a debate's audit */
export type AuditView =
  | { status: 'completed'; contentHash: string; receipt: LedgerReceipt }
  | { status: 'failed'; contentHash: string | null; error: SerializedError }

export interface DebateOutcome {
  sessionId: SessionId
  context: DebateContext
  messages: readonly DebateMessage[]
  synthesis: SynthesisResult
  /** null when auditing is disabled */
  audit: AuditView | null
}

/** Events of a streamed debate, tagged by `type` */
export type DebateStreamEvent =
  | { type: 'session'; sessionId: SessionId; topology: TopologyName; query: string }
  | { type: 'message'; sessionId: SessionId; message: DebateMessage }
  | { type: 'synthesis'; sessionId: SessionId; synthesis: SynthesisResult }
  | { type: 'audit_status'; sessionId: SessionId; status: 'recording' }
  | { type: 'audit'; sessionId: SessionId; audit: AuditView }
  | { type: 'error'; sessionId: SessionId | null; error: SerializedError }

export interface SessionSummary {
  sessionId: SessionId
  topology: TopologyName
  status: DebateStatus
  query: string
  messageCount: number
  riskLevel: RiskLevel | null
  auditStatus: 'recording' | 'completed' | 'failed' | null
  createdAt: string
}
