import type { AuditPayload, LedgerReceipt } from './types.js'

function section(title: string, lines: readonly string[]): string {
  return [title, '-'.repeat(title.length), ...lines].join('\n')
}

/** Plain-text compliance report for one recorded debate */
export function renderAuditReport(
  payload: AuditPayload,
  receipt: LedgerReceipt,
  generatedAt: string = new Date().toISOString()
): string {
  const title = 'DEBATE COMPLIANCE AUDIT REPORT'
  const { synthesis } = payload
  const dissents = synthesis.dissents.length === 0 ? ['None'] : synthesis.dissents.map((d) => `• ${d}`)

  return [
    [
      title,
      '='.repeat(title.length),
      `Generated: ${generatedAt}`,
      `Session: ${payload.sessionId}`,
      `Content Hash: ${receipt.contentHash}`,
      `Transaction: ${receipt.transactionId}`,
      `Network: ${receipt.network}`,
    ].join('\n'),
    section('QUERY', [payload.query]),
    section('DECISION SUMMARY', [
      `Risk Level: ${synthesis.riskLevel}`,
      `Confidence: ${String(synthesis.confidence)}%`,
      `Approach: ${synthesis.approach}`,
      `Cost of Delay: ${synthesis.costOfDelay}`,
      `Consensus: ${synthesis.consensus ? 'YES' : 'NO'}`,
    ]),
    section('DISSENTING OPINIONS', dissents),
    section('LEDGER VERIFICATION', [
      `Block Number: ${String(receipt.blockNumber)}`,
      `Status: ${receipt.status}`,
      `Recorded At: ${receipt.recordedAt}`,
      'Recompute the SHA-256 digest of the canonical payload and compare it with the content hash above.',
    ]),
    'END OF REPORT',
  ].join('\n\n') + '\n'
}
