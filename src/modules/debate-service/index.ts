export { DebateService, createDebateService } from './debate-service.js'
export type { DebateServiceOptions } from './debate-service.js'
export type {
  AuditView,
  DebateOutcome,
  DebateRequest,
  DebateStreamEvent,
  SessionSummary,
  StreamRequest,
} from './types.js'
