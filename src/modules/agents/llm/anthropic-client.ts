/**
 * Anthropic client construction and the narrow slice of it agents use.
 */

import Anthropic from '@anthropic-ai/sdk'
import { ConfigError } from '../../../core/errors.js'
import type { AgentSettings } from '../../config/config-schema.js'

/** The subset of the SDK client the LLM agents call; tests supply a fake */
export interface MessagesClient {
  messages: {
    create(
      body: Anthropic.MessageCreateParamsNonStreaming,
      options?: { signal?: AbortSignal; timeout?: number }
    ): Promise<Anthropic.Message>
  }
}

let client: Anthropic | null = null

/**
 * Shared client for the process. SDK-level retries are off: the debate
 * engine owns retry and timeout policy.
 */
export function getAnthropicClient(
  settings: Pick<AgentSettings, 'api_key' | 'api_key_env'>,
  env: NodeJS.ProcessEnv = process.env
): Anthropic {
  if (client !== null) return client
  const apiKey = settings.api_key ?? env[settings.api_key_env]
  if (apiKey === undefined || apiKey === '') {
    throw new ConfigError(
      `agents.backend is "llm" but no API key was found in $${settings.api_key_env}`,
      { apiKeyEnv: settings.api_key_env }
    )
  }
  client = new Anthropic({ apiKey, maxRetries: 0 })
  return client
}

/** Concatenate the text blocks of a response */
export function responseText(message: Anthropic.Message): string {
  return message.content
    .map((block) => (block.type === 'text' ? block.text : ''))
    .join('')
    .trim()
}
