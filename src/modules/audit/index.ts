export { AuditRecorder } from './audit-recorder.js'
export type { AuditRecorderOptions } from './audit-recorder.js'
export { SqliteLedger, deriveTransactionId } from './sqlite-ledger.js'
export type { SqliteLedgerOptions } from './sqlite-ledger.js'
export {
  createPayload,
  payloadFromContext,
  canonicalize,
  hashPayload,
  PAYLOAD_VERSION,
  CONTENT_HASH_PATTERN,
} from './payload.js'
export { renderAuditReport } from './report.js'
export type {
  AuditPayload,
  AuditRecord,
  AuditStatus,
  AuditStatusStore,
  AuditOutcome,
  LedgerBackend,
  LedgerMetadata,
  LedgerReceipt,
  RoundTranscript,
  VerificationResult,
} from './types.js'
