/**
 * AnthropicMediator: the model writes the verdict prose; the risk level,
 * confidence, approach and action plan always come from the deterministic
 * decision module so they stay reproducible.
 */

import { AgentContractError } from '../../../core/errors.js'
import { aggregateText } from '../../decision/phrases.js'
import { synthesizeDecision } from '../../decision/synthesize.js'
import type { DecisionOptions, SidePosition, SynthesisResult } from '../../decision/types.js'
import type { AgentCallOptions, MediatorAgent } from '../types.js'
import type { MessagesClient } from './anthropic-client.js'
import { responseText } from './anthropic-client.js'
import { mapAnthropicError } from './error-mapping.js'
import { MEDIATOR_SYSTEM_PROMPT } from './personas.js'

export interface AnthropicMediatorOptions {
  client: MessagesClient
  model: string
  maxTokens: number
  decision: DecisionOptions
}

const COST_OF_DELAY_LINE = /cost of delay:\**\s*\**([^\n*]+)/i

/** Pull the "Cost of Delay: ..." estimate out of model prose */
export function parseCostOfDelay(verdict: string): string | null {
  const match = COST_OF_DELAY_LINE.exec(verdict)
  const value = match?.[1]?.trim()
  return value === undefined || value === '' ? null : value
}

export class AnthropicMediator implements MediatorAgent {
  readonly id = 'mediator'
  readonly displayName = 'The Mediator'
  readonly role = 'mediator' as const
  readonly backend = 'external' as const

  private readonly _options: AnthropicMediatorOptions

  constructor(options: AnthropicMediatorOptions) {
    this._options = options
  }

  async synthesize(
    positions: readonly SidePosition[],
    query: string,
    options: AgentCallOptions = {}
  ): Promise<SynthesisResult> {
    const computed = synthesizeDecision({ query, positions }, this._options.decision)
    const prompt = [
      `Business decision under review:\n${query}`,
      ...positions.map((p) => `=== ${p.displayName} (${p.role}) ===\n${aggregateText(p)}`),
      `Computed classification: risk ${computed.riskLevel}, confidence ${String(computed.confidence)}%, ` +
        `approach "${computed.approach}", estimated cost of delay ${computed.costOfDelay}.`,
    ].join('\n\n')

    let verdict: string
    try {
      const message = await this._options.client.messages.create(
        {
          model: this._options.model,
          max_tokens: this._options.maxTokens,
          system: MEDIATOR_SYSTEM_PROMPT,
          messages: [{ role: 'user', content: prompt }],
        },
        options.signal === undefined ? undefined : { signal: options.signal }
      )
      verdict = responseText(message)
    } catch (err) {
      throw mapAnthropicError(err, this.id)
    }
    if (verdict.length === 0) {
      throw new AgentContractError('Mediator returned an empty verdict', { agentId: this.id })
    }

    return {
      ...computed,
      verdict,
      costOfDelay: parseCostOfDelay(verdict) ?? computed.costOfDelay,
    }
  }
}
