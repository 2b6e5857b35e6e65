/**
 * Deterministic synthesis: a pure function of the advisors' positions, the
 * query and the configured phrase lists.
 */

import { assess } from './assessments.js'
import { selectActionPlan } from './action-plans.js'
import { estimateCostOfDelay } from './cost-of-delay.js'
import { aggregateText, detectSignals, raisesSignal } from './phrases.js'
import { classifyRisk } from './risk-table.js'
import { renderVerdict } from './verdict.js'
import type { DecisionInput, DecisionOptions, SidePosition, SynthesisResult } from './types.js'

function joinRole(positions: readonly SidePosition[], role: SidePosition['role']): string {
  return positions
    .filter((p) => p.role === role)
    .map(aggregateText)
    .join('\n\n')
}

/**
 * An advisor dissents when its own signal points away from the approach:
 * a blocking risk advisor against a go-ahead, a pushing growth advisor
 * against a slowed rollout.
 */
export function collectDissents(
  positions: readonly SidePosition[],
  options: Pick<DecisionOptions, 'blockPhrases' | 'shipPhrases'>
): string[] {
  const dissents: string[] = []
  for (const position of positions) {
    if (!raisesSignal(position, options)) continue
    dissents.push(
      position.role === 'risk'
        ? `${position.displayName}: Significant compliance risks must be addressed first`
        : `${position.displayName}: Every month of delay forfeits market opportunity`
    )
  }
  return dissents
}

export function synthesizeDecision(input: DecisionInput, options: DecisionOptions): SynthesisResult {
  const signals = detectSignals(input.positions, options)
  const classification = classifyRisk(signals)
  const riskText = joinRole(input.positions, 'risk')
  const growthText = joinRole(input.positions, 'growth')
  const dissents = collectDissents(input.positions, options)

  const fields = {
    ...classification,
    costOfDelay: estimateCostOfDelay(input.query, options.defaultCostOfDelay),
    actionPlan: selectActionPlan(input.query).steps,
    signals,
    assessments: assess(input.query, riskText, growthText, classification.riskLevel),
    consensus: dissents.length === 0,
    dissents,
  }

  return { ...fields, verdict: renderVerdict(fields) }
}
