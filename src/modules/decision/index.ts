/**
 * Barrel exports for the decision module.
 */

export { synthesizeDecision, collectDissents } from './synthesize.js'
export { classifyRisk, RISK_COLORS } from './risk-table.js'
export { detectSignals, containsPhrase, containsAnyPhrase, aggregateText } from './phrases.js'
export { estimateCostOfDelay, extractMonetaryAmount, formatMoney } from './cost-of-delay.js'
export { selectActionPlan, ACTION_PLANS } from './action-plans.js'
export type { ActionPlan } from './action-plans.js'
export { renderVerdict } from './verdict.js'
export type {
  Approach,
  DecisionAssessments,
  DecisionInput,
  DecisionOptions,
  DecisionSignals,
  RiskClassification,
  SidePosition,
  SynthesisResult,
} from './types.js'
