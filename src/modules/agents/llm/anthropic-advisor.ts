/**
 * AnthropicAdvisor: advisor backed by the Anthropic Messages API.
 *
 * Stateless per call, so one instance serves any number of concurrent debates.
 */

import type { AdvisorRole, ParticipantRole } from '../../../core/types.js'
import { AgentContractError } from '../../../core/errors.js'
import type { AgentCallOptions, DebateAgent } from '../types.js'
import type { MessagesClient } from './anthropic-client.js'
import { responseText } from './anthropic-client.js'
import { mapAnthropicError } from './error-mapping.js'
import type { AdvisorPersona } from './personas.js'

export interface AnthropicAdvisorOptions {
  client: MessagesClient
  persona: AdvisorPersona
  model: string
  maxTokens: number
}

const ROLE_NAMES: Record<ParticipantRole, string> = {
  risk: 'the risk advisor',
  growth: 'the growth advisor',
  mediator: 'the mediator',
}

export class AnthropicAdvisor implements DebateAgent {
  readonly id: string
  readonly displayName: string
  readonly role: AdvisorRole
  readonly backend = 'external' as const

  private readonly _client: MessagesClient
  private readonly _persona: AdvisorPersona
  private readonly _model: string
  private readonly _maxTokens: number

  constructor(options: AnthropicAdvisorOptions) {
    this.id = options.persona.id
    this.displayName = options.persona.displayName
    this.role = options.persona.role
    this._client = options.client
    this._persona = options.persona
    this._model = options.model
    this._maxTokens = options.maxTokens
  }

  openingArgument(query: string, options: AgentCallOptions = {}): Promise<string> {
    return this._complete(
      `Business decision under review:\n${query}\n\nGive your opening argument.`,
      options
    )
  }

  rebut(
    query: string,
    opponentText: string,
    opponentRole: ParticipantRole,
    options: AgentCallOptions = {}
  ): Promise<string> {
    return this._complete(
      `Business decision under review:\n${query}\n\n` +
        `Statement from ${ROLE_NAMES[opponentRole]}:\n${opponentText}\n\n` +
        'Rebut their specific claims.',
      options
    )
  }

  finalPosition(query: string, opponentLastMessage: string, options: AgentCallOptions = {}): Promise<string> {
    return this._complete(
      `Business decision under review:\n${query}\n\n` +
        `Your opponent's latest statement:\n${opponentLastMessage}\n\n` +
        'Give your final position. You may concede minor points but restate your core recommendation.',
      options
    )
  }

  private async _complete(prompt: string, options: AgentCallOptions): Promise<string> {
    let text: string
    try {
      const message = await this._client.messages.create(
        {
          model: this._model,
          max_tokens: this._maxTokens,
          system: this._persona.system,
          messages: [{ role: 'user', content: prompt }],
        },
        options.signal === undefined ? undefined : { signal: options.signal }
      )
      text = responseText(message)
    } catch (err) {
      throw mapAnthropicError(err, this.id)
    }
    if (text.length === 0) {
      throw new AgentContractError(`Agent "${this.id}" returned an empty response`, { agentId: this.id })
    }
    return text
  }
}
