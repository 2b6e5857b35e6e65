/**
 * Canned phased action plans, selected by domain cues in the query.
 * The first plan whose cues match wins; the generic plan is the fallback.
 */

import { containsAnyPhrase } from './phrases.js'

export interface ActionPlan {
  id: 'cross-border-data' | 'regulated-transport' | 'contractor-classification' | 'generic'
  cues: readonly string[]
  steps: readonly string[]
}

export const ACTION_PLANS: readonly ActionPlan[] = [
  {
    id: 'cross-border-data',
    cues: ['gdpr', 'eu', 'europe', 'european', 'personal data', 'data transfer'],
    steps: [
      '**Immediate:** Launch to non-EU markets first (2 weeks)',
      '**Week 3-4:** Ship consent management and data minimization',
      '**Week 5-6:** Add data portability and deletion workflows',
      '**Week 7-8:** EU soft launch with a documented compliance roadmap',
      '**Ongoing:** Close the remaining gaps while operating under DPO review',
    ],
  },
  {
    id: 'regulated-transport',
    cues: ['hemp', 'cannabis', 'cbd', 'transport', 'shipment', 'freight'],
    steps: [
      '**Immediate:** Legal review of every transit jurisdiction (24 hours)',
      '**Day 2:** Retain local counsel in the strictest transit states',
      '**Day 3:** Document federal compliance and lab certificates for the load',
      '**Day 4-5:** Plan an alternative route that avoids zero-tolerance states',
      '**Execute:** Choose the route on the documented risk/reward comparison',
    ],
  },
  {
    id: 'contractor-classification',
    cues: ['contractor', 'contractors', 'california', 'ab5', 'freelancer', 'freelancers'],
    steps: [
      '**Immediate:** Engage through corp-to-corp agreements where possible',
      '**Week 1:** Put written scopes of work in place for every contractor',
      '**Week 2:** Remove day-to-day management from contractor roles',
      '**Month 2:** Review each role against the ABC test',
      '**Month 3:** Convert the highest-risk roles to employment',
    ],
  },
  {
    id: 'generic',
    cues: [],
    steps: [
      '**Week 1:** Complete a structured risk assessment',
      '**Week 2:** Implement minimum viable compliance',
      '**Month 2:** Launch with monitoring and clear rollback criteria',
      '**Month 3:** Iterate on feedback and incident data',
      '**Ongoing:** Scale compliance alongside growth',
    ],
  },
]

export function selectActionPlan(query: string): ActionPlan {
  const match = ACTION_PLANS.find((plan) => plan.cues.length > 0 && containsAnyPhrase(query, plan.cues))
  return match ?? genericPlan()
}

function genericPlan(): ActionPlan {
  const plan = ACTION_PLANS.find((p) => p.id === 'generic')
  if (plan === undefined) {
    throw new Error('ACTION_PLANS is missing the generic fallback plan')
  }
  return plan
}
