/**
 * Secondary one-line assessments shown in the verdict.
 */

import type { RiskLevel } from '../../core/types.js'
import { containsAnyPhrase } from './phrases.js'
import type { DecisionAssessments } from './types.js'

export function assessLegalExposure(riskText: string): string {
  if (containsAnyPhrase(riskText, ['GDPR'])) return 'Up to 4% of global revenue'
  if (containsAnyPhrase(riskText, ['criminal', 'felony'])) return 'Criminal liability risk'
  if (containsAnyPhrase(riskText, ['violation', 'violations', 'misclassification'])) {
    return '$100K-$1M in fines'
  }
  return 'Manageable with documentation'
}

export function assessGrowthImpact(growthText: string): string {
  if (containsAnyPhrase(growthText, ['billion', 'billions'])) return 'Massive first-mover advantage'
  if (containsAnyPhrase(growthText, ['$500K', 'million', 'millions'])) return 'Significant market opportunity'
  return 'Moderate growth potential'
}

export function assessOpportunityWindow(query: string): string {
  if (/\b3[\s-]months?\b/i.test(query)) return '3 months (closing fast)'
  if (/\b10 days\b/i.test(query)) return '10 days (urgent)'
  return '6-12 months'
}

export function estimateBreakEven(riskLevel: RiskLevel): string {
  switch (riskLevel) {
    case 'HIGH':
      return '18 months (high risk premium)'
    case 'MEDIUM-HIGH':
      return '12 months'
    case 'MEDIUM':
      return '9 months'
    case 'LOW':
      return '4 months'
  }
}

export function assess(
  query: string,
  riskText: string,
  growthText: string,
  riskLevel: RiskLevel
): DecisionAssessments {
  return {
    legalExposure: assessLegalExposure(riskText),
    growthImpact: assessGrowthImpact(growthText),
    opportunityWindow: assessOpportunityWindow(query),
    breakEven: estimateBreakEven(riskLevel),
  }
}
