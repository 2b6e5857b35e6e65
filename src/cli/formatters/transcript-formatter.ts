/**
 * Human-readable rendering of debate transcripts, decisions and audits.
 */

import type { RoundName } from '../../core/types.js'
import type { DebateMessage } from '../../modules/debate/types.js'
import type { AuditView } from '../../modules/debate-service/types.js'
import type { SynthesisResult } from '../../modules/decision/types.js'
import { formatTable, type TableColumn } from '../utils/formatting.js'

const ROUND_LABELS: Record<RoundName, string> = {
  opening: 'Opening',
  rebuttal: 'Rebuttal',
  final: 'Final Position',
  synthesis: 'Synthesis',
}

export function formatMessage(message: DebateMessage): string {
  const header = `── ${message.agent} · ${ROUND_LABELS[message.round]} ──`
  return `${header}\n${message.content}\n`
}

const DECISION_COLUMNS: readonly TableColumn<SynthesisResult>[] = [
  { header: 'Risk Level', value: (s) => s.riskLevel },
  { header: 'Confidence', value: (s) => `${String(s.confidence)}%` },
  { header: 'Approach', value: (s) => s.approach },
  { header: 'Cost of Delay', value: (s) => s.costOfDelay },
]

export function formatDecisionTable(synthesis: SynthesisResult): string {
  return formatTable(DECISION_COLUMNS, [synthesis])
}

export function formatAudit(audit: AuditView | null): string {
  if (audit === null) return 'Audit: disabled'
  if (audit.status === 'failed') return `Audit: FAILED (${audit.error.message})`
  const { receipt } = audit
  return `Audit: recorded ${audit.contentHash}\n  transaction ${receipt.transactionId}, block ${String(receipt.blockNumber)}`
}
