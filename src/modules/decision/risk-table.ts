import type { RiskLevel } from '../../core/types.js'
import type { DecisionSignals, RiskClassification } from './types.js'

/**
 * Fixed mapping from the two signals to (level, confidence, approach).
 * Confidence falls as combined risk rises.
 */
export function classifyRisk(signals: DecisionSignals): RiskClassification {
  const { riskBlocks, growthPushes } = signals
  if (riskBlocks && growthPushes) {
    return { riskLevel: 'HIGH', confidence: 45, approach: 'proceed with caution' }
  }
  if (riskBlocks) {
    return { riskLevel: 'MEDIUM-HIGH', confidence: 60, approach: 'phased approach required' }
  }
  if (growthPushes) {
    return { riskLevel: 'MEDIUM', confidence: 75, approach: 'proceed with monitoring' }
  }
  return { riskLevel: 'LOW', confidence: 85, approach: 'safe to proceed' }
}

/** Display colour per level, sent to clients alongside the synthesis */
export const RISK_COLORS: Record<RiskLevel, string> = {
  HIGH: '#ef4444',
  'MEDIUM-HIGH': '#f59e0b',
  MEDIUM: '#eab308',
  LOW: '#22c55e',
}
