/**
 * Types for the synthesis/decision module.
 */

import type { AdvisorRole, ParticipantId, RiskLevel } from '../../core/types.js'

/** Everything one advisor said, by slot. Council advisors never fill `final`. */
export interface SidePosition {
  participantId: ParticipantId
  displayName: string
  role: AdvisorRole
  opening: string
  rebuttal?: string
  final?: string
}

export type Approach =
  | 'proceed with caution'
  | 'phased approach required'
  | 'proceed with monitoring'
  | 'safe to proceed'

export interface DecisionSignals {
  /** Some risk-role advisor's aggregate text carries a blocking recommendation */
  riskBlocks: boolean
  /** Some growth-role advisor's aggregate text carries a ship-now recommendation */
  growthPushes: boolean
}

export interface RiskClassification {
  riskLevel: RiskLevel
  confidence: number
  approach: Approach
}

export interface DecisionAssessments {
  legalExposure: string
  growthImpact: string
  opportunityWindow: string
  breakEven: string
}

export interface SynthesisResult extends RiskClassification {
  verdict: string
  costOfDelay: string
  actionPlan: readonly string[]
  signals: DecisionSignals
  assessments: DecisionAssessments
  /** True when no advisor dissents from the recommendation */
  consensus: boolean
  dissents: readonly string[]
}

export interface DecisionOptions {
  blockPhrases: readonly string[]
  shipPhrases: readonly string[]
  defaultCostOfDelay: string
}

export interface DecisionInput {
  query: string
  positions: readonly SidePosition[]
}
