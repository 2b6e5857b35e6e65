/**
 * Zod validation schemas for the configuration system.
 *
 * Sections:
 *  - global settings
 *  - agents (backend flag, model, retry and timeout constants)
 *  - debate (topology, query limits)
 *  - pacing (streaming delays)
 *  - decision (phrase lists, default cost of delay)
 *  - audit, sessions, server
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Agents
// ---------------------------------------------------------------------------

/** `scripted` uses local templates, `llm` calls the Anthropic Messages API */
export const AgentBackendSettingSchema = z.enum(['scripted', 'llm'])
export type AgentBackendSetting = z.infer<typeof AgentBackendSettingSchema>

export const RetrySettingsSchema = z
  .object({
    /** Total attempts per external agent call, including the first */
    max_attempts: z.number().int().min(1).max(10),
    /** Backoff before the second attempt; doubles each time */
    base_delay_ms: z.number().int().min(0),
  })
  .strict()

export type RetrySettings = z.infer<typeof RetrySettingsSchema>

export const AgentSettingsSchema = z
  .object({
    backend: AgentBackendSettingSchema,
    model: z.string().min(1),
    max_tokens: z.number().int().min(64).max(8192),
    /** Per-call deadline for external agents */
    timeout_ms: z.number().int().positive(),
    retry: RetrySettingsSchema,
    /** Name of the environment variable that holds the API key */
    api_key_env: z.string().min(1),
    /** Inline key; prefer api_key_env */
    api_key: z.string().optional(),
  })
  .strict()

export type AgentSettings = z.infer<typeof AgentSettingsSchema>

// ---------------------------------------------------------------------------
// Debate
// ---------------------------------------------------------------------------

export const TopologySettingSchema = z.enum(['adversarial', 'council'])

export const DebateSettingsSchema = z
  .object({
    topology: TopologySettingSchema,
    max_query_length: z.number().int().min(1).max(100_000),
    /** Let the council's initial analyses overlap */
    council_concurrency: z.boolean(),
  })
  .strict()

export type DebateSettings = z.infer<typeof DebateSettingsSchema>

export const PacingSettingsSchema = z
  .object({
    enabled: z.boolean(),
    /** Pause before every non-initial state while streaming */
    thinking_ms: z.number().int().min(0),
    /** Pause after each streamed message */
    message_gap_ms: z.number().int().min(0),
  })
  .strict()

export type PacingSettings = z.infer<typeof PacingSettingsSchema>

export const DecisionSettingsSchema = z
  .object({
    /** A risk advisor whose text contains one of these is blocking */
    block_phrases: z.array(z.string().min(1)).min(1),
    /** A growth advisor whose text contains one of these is pushing to ship */
    ship_phrases: z.array(z.string().min(1)).min(1),
    default_cost_of_delay: z.string().min(1),
  })
  .strict()

export type DecisionSettings = z.infer<typeof DecisionSettingsSchema>

// ---------------------------------------------------------------------------
// Audit / sessions / server
// ---------------------------------------------------------------------------

export const AuditSettingsSchema = z
  .object({
    enabled: z.boolean(),
    /** Label stamped on receipts from the in-memory ledger */
    network: z.string().min(1),
    /** Block number of the first ledger entry is genesis_block + 1 */
    genesis_block: z.number().int().min(0),
  })
  .strict()

export type AuditSettings = z.infer<typeof AuditSettingsSchema>

export const SessionSettingsSchema = z
  .object({
    ttl_ms: z.number().int().positive(),
    max_entries: z.number().int().min(1),
  })
  .strict()

export type SessionSettings = z.infer<typeof SessionSettingsSchema>

export const ServerSettingsSchema = z
  .object({
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
  })
  .strict()

export type ServerSettings = z.infer<typeof ServerSettingsSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

export const CURRENT_CONFIG_FORMAT_VERSION = '1'

export const SUPPORTED_CONFIG_FORMAT_VERSIONS: readonly string[] = ['1']

export const VerdictConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    agents: AgentSettingsSchema,
    debate: DebateSettingsSchema,
    pacing: PacingSettingsSchema,
    decision: DecisionSettingsSchema,
    audit: AuditSettingsSchema,
    sessions: SessionSettingsSchema,
    server: ServerSettingsSchema,
  })
  .strict()

export type VerdictConfig = z.infer<typeof VerdictConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (config files, env overlay and CLI flags before merging)
// ---------------------------------------------------------------------------

export const PartialVerdictConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    agents: AgentSettingsSchema.extend({ retry: RetrySettingsSchema.partial() })
      .partial()
      .optional(),
    debate: DebateSettingsSchema.partial().optional(),
    pacing: PacingSettingsSchema.partial().optional(),
    decision: DecisionSettingsSchema.partial().optional(),
    audit: AuditSettingsSchema.partial().optional(),
    sessions: SessionSettingsSchema.partial().optional(),
    server: ServerSettingsSchema.partial().optional(),
  })
  .strict()

export type PartialVerdictConfig = z.infer<typeof PartialVerdictConfigSchema>
