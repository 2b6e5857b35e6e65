/**
 * Types for the audit recorder and its ledger backend.
 */

import type { SerializedError } from '../../core/errors.js'
import type { ParticipantId, RiskLevel, SessionId } from '../../core/types.js'
import type { Approach } from '../decision/types.js'

// ---------------------------------------------------------------------------
// Payload
// ---------------------------------------------------------------------------

/** Participant id → message content, for one round */
export type RoundTranscript = Record<ParticipantId, string>

export interface AuditPayload {
  version: '1.0'
  sessionId: SessionId
  recordedAt: string
  query: string
  debate: {
    opening: RoundTranscript
    rebuttal: RoundTranscript
    final: RoundTranscript
  }
  synthesis: {
    riskLevel: RiskLevel
    confidence: number
    approach: Approach
    costOfDelay: string
    verdict: string
    consensus: boolean
    dissents: string[]
  }
}

// ---------------------------------------------------------------------------
// Ledger
// ---------------------------------------------------------------------------

export type LedgerMetadata = Record<string, string | number | boolean>

export interface LedgerReceipt {
  transactionId: string
  blockNumber: number
  status: 'confirmed'
  contentHash: string
  recordedAt: string
  network: string
}

export type VerificationResult =
  | { verified: true; receipt: LedgerReceipt }
  | { verified: false; contentHash: string }

/** Where content hashes are anchored. Real or simulated; only the receipt shape matters. */
export interface LedgerBackend {
  submit(contentHash: string, metadata?: LedgerMetadata): Promise<LedgerReceipt>
  verify(contentHash: string): Promise<VerificationResult>
  history(): Promise<LedgerReceipt[]>
}

// ---------------------------------------------------------------------------
// Per-session status
// ---------------------------------------------------------------------------

export type AuditRecord =
  | { status: 'recording'; contentHash: string; startedAt: string }
  | {
      status: 'completed'
      contentHash: string
      payload: AuditPayload
      receipt: LedgerReceipt
    }
  | { status: 'failed'; contentHash: string | null; error: SerializedError; failedAt: string }

export type AuditStatus = AuditRecord['status']

/** The slice of session storage the recorder writes to */
export interface AuditStatusStore {
  getAudit(sessionId: SessionId): AuditRecord | null
  setAudit(sessionId: SessionId, record: AuditRecord): void
}

export interface AuditOutcome {
  payload: AuditPayload
  contentHash: string
  receipt: LedgerReceipt
}
