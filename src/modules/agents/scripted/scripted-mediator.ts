import type { SidePosition, SynthesisResult, DecisionOptions } from '../../decision/types.js'
import { synthesizeDecision } from '../../decision/synthesize.js'
import type { MediatorAgent } from '../types.js'

/** Mediator backed directly by the deterministic decision module */
export class ScriptedMediator implements MediatorAgent {
  readonly id = 'mediator'
  readonly displayName = 'The Mediator'
  readonly role = 'mediator' as const
  readonly backend = 'scripted' as const

  private readonly _options: DecisionOptions

  constructor(options: DecisionOptions) {
    this._options = options
  }

  async synthesize(positions: readonly SidePosition[], query: string): Promise<SynthesisResult> {
    return synthesizeDecision({ query, positions }, this._options)
  }
}
