/**
 * Built-in default values for the configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type {
  VerdictConfig,
  AgentSettings,
  DecisionSettings,
  PacingSettings,
} from './config-schema.js'

// ---------------------------------------------------------------------------
// Agents
// ---------------------------------------------------------------------------

export const DEFAULT_AGENT_SETTINGS: AgentSettings = {
  backend: 'scripted',
  model: 'claude-3-5-haiku-latest',
  max_tokens: 1000,
  timeout_ms: 60_000,
  retry: {
    max_attempts: 3,
    base_delay_ms: 2_000,
  },
  api_key_env: 'ANTHROPIC_API_KEY',
}

// ---------------------------------------------------------------------------
// Streaming pacing (cosmetic; set enabled: false for instant output)
// ---------------------------------------------------------------------------

export const DEFAULT_PACING_SETTINGS: PacingSettings = {
  enabled: true,
  thinking_ms: 2_500,
  message_gap_ms: 300,
}

// ---------------------------------------------------------------------------
// Decision heuristics
// ---------------------------------------------------------------------------

export const DEFAULT_DECISION_SETTINGS: DecisionSettings = {
  block_phrases: [
    'BLOCK',
    'ABSOLUTELY NOT',
    'DO NOT PROCEED',
    'HIGH RISK - RECONSIDER',
    'UNACCEPTABLE EXPOSURE',
  ],
  ship_phrases: ['SHIP NOW', 'SHIP IT NOW', 'LAUNCH IMMEDIATELY'],
  default_cost_of_delay: '$500K/month',
}

// ---------------------------------------------------------------------------
// Full default config document
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: VerdictConfig = {
  config_format_version: '1',
  global: {
    log_level: 'warn',
  },
  agents: DEFAULT_AGENT_SETTINGS,
  debate: {
    topology: 'adversarial',
    max_query_length: 4_000,
    council_concurrency: true,
  },
  pacing: DEFAULT_PACING_SETTINGS,
  decision: DEFAULT_DECISION_SETTINGS,
  audit: {
    enabled: true,
    network: 'in-memory-ledger',
    genesis_block: 15_234_567,
  },
  sessions: {
    ttl_ms: 3_600_000,
    max_entries: 500,
  },
  server: {
    host: '127.0.0.1',
    port: 8001,
  },
}
