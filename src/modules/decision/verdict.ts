/**
 * Markdown rendering of a synthesis result.
 */

import type { SynthesisResult } from './types.js'

type VerdictFields = Omit<SynthesisResult, 'verdict'>

export function renderVerdict(result: VerdictFields): string {
  const lines: string[] = [
    `⚖️ **MEDIATOR VERDICT: ${result.approach.toUpperCase()}**`,
    '',
    '**📊 Risk Assessment:**',
    `- Risk Level: **${result.riskLevel}**`,
    `- Legal Exposure: ${result.assessments.legalExposure}`,
    `- Growth Impact: ${result.assessments.growthImpact}`,
    '',
    '**💰 Financial Analysis:**',
    `- Cost of Delay: **${result.costOfDelay}**`,
    `- Opportunity Window: ${result.assessments.opportunityWindow}`,
    `- Break-even Point: ${result.assessments.breakEven}`,
    '',
    '**🎯 Recommended Action Plan:**',
    ...result.actionPlan.map((step, index) => `${String(index + 1)}. ${step}`),
  ]

  if (result.dissents.length > 0) {
    lines.push('', '**🗣️ Dissenting Views:**', ...result.dissents.map((d) => `- ${d}`))
  }

  lines.push('', `**📈 Confidence Level:** ${String(result.confidence)}%`)
  return lines.join('\n')
}
