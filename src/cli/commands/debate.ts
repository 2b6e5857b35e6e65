/**
 * `verdict debate <query...>`: run one debate from the terminal.
 *
 * Exit codes:
 *   0  debate completed (and audited, unless --no-audit)
 *   1  unexpected error
 *   2  invalid usage, configuration or query
 *   3  the debate failed
 *   4  the debate completed but its audit failed
 */

import type { Command } from 'commander'
import { ConfigError, DebateFailedError, InvalidQueryError, toError } from '../../core/errors.js'
import type { PartialVerdictConfig, VerdictConfig } from '../../modules/config/config-schema.js'
import {
  AgentBackendSettingSchema,
  PartialVerdictConfigSchema,
  TopologySettingSchema,
} from '../../modules/config/config-schema.js'
import { createDebateService, type DebateService } from '../../modules/debate-service/debate-service.js'
import type { AuditView, DebateStreamEvent } from '../../modules/debate-service/types.js'
import { createLogger } from '../../utils/logger.js'
import { emitEvent, forwardBusEvents, type Writer } from '../formatters/streaming.js'
import { formatAudit, formatDecisionTable, formatMessage } from '../formatters/transcript-formatter.js'
import { loadCliConfig, type ConfigDirOptions } from '../utils/load-config.js'

const logger = createLogger('debate-cmd')

export const DEBATE_EXIT_SUCCESS = 0
export const DEBATE_EXIT_ERROR = 1
export const DEBATE_EXIT_INVALID = 2
export const DEBATE_EXIT_FAILED = 3
export const DEBATE_EXIT_AUDIT_FAILED = 4

export interface DebateCommandOptions extends ConfigDirOptions {
  topology?: string
  backend?: string
  stream?: boolean
  pacing?: boolean
  audit?: boolean
  outputFormat?: 'human' | 'json'
}

export interface DebateCommandDeps {
  /** Builds the service from the loaded config (tests inject fakes) */
  createService?: (config: VerdictConfig) => DebateService
  stdout?: Writer
  stderr?: Writer
}

/**
 * Translate flags into the highest-priority config layer.
 * @throws {ConfigError} on an unknown topology or backend
 */
export function buildCliOverrides(opts: DebateCommandOptions): PartialVerdictConfig {
  const overrides: Record<string, Record<string, unknown>> = {}
  if (opts.topology !== undefined) {
    const topology = TopologySettingSchema.safeParse(opts.topology)
    if (!topology.success) {
      throw new ConfigError(`Unknown topology "${opts.topology}" (expected adversarial or council)`)
    }
    overrides.debate = { topology: topology.data }
  }
  if (opts.backend !== undefined) {
    const backend = AgentBackendSettingSchema.safeParse(opts.backend)
    if (!backend.success) {
      throw new ConfigError(`Unknown backend "${opts.backend}" (expected scripted or llm)`)
    }
    overrides.agents = { backend: backend.data }
  }
  if (opts.pacing === false) overrides.pacing = { enabled: false }
  if (opts.audit === false) overrides.audit = { enabled: false }
  return PartialVerdictConfigSchema.parse(overrides)
}

function exitCodeForAudit(audit: AuditView | null): number {
  return audit?.status === 'failed' ? DEBATE_EXIT_AUDIT_FAILED : DEBATE_EXIT_SUCCESS
}

export async function runDebateAction(
  queryParts: string[],
  opts: DebateCommandOptions = {},
  deps: DebateCommandDeps = {}
): Promise<number> {
  const out: Writer = deps.stdout ?? ((line) => process.stdout.write(line))
  const err: Writer = deps.stderr ?? ((line) => process.stderr.write(line))
  const json = opts.outputFormat === 'json'

  let config: VerdictConfig
  try {
    const system = await loadCliConfig(opts, buildCliOverrides(opts))
    config = system.getConfig()
  } catch (error) {
    if (error instanceof ConfigError) {
      err(`  Configuration error: ${error.message}\n`)
      return DEBATE_EXIT_INVALID
    }
    throw error
  }

  const service = (deps.createService ?? ((cfg) => createDebateService({ config: cfg })))(config)
  const stopForwarding = json ? forwardBusEvents(service.eventBus, out) : undefined
  const query = queryParts.join(' ')

  try {
    return opts.stream === true
      ? await streamToTerminal(service, query, json, out, err)
      : await runToTerminal(service, query, json, out, err)
  } catch (error) {
    const cause = toError(error)
    logger.error({ err: cause.message }, 'Debate command failed')
    err(`  Error: ${cause.message}\n`)
    return DEBATE_EXIT_ERROR
  } finally {
    stopForwarding?.()
    service.close()
  }
}

async function runToTerminal(
  service: DebateService,
  query: string,
  json: boolean,
  out: Writer,
  err: Writer
): Promise<number> {
  try {
    const outcome = await service.runDebate({ query })
    if (json) {
      emitEvent(
        'debate:result',
        { sessionId: outcome.sessionId, synthesis: outcome.synthesis, audit: outcome.audit },
        out
      )
    } else {
      for (const message of outcome.messages) out(formatMessage(message) + '\n')
      out(formatDecisionTable(outcome.synthesis) + '\n\n')
      out(formatAudit(outcome.audit) + '\n')
    }
    return exitCodeForAudit(outcome.audit)
  } catch (error) {
    if (error instanceof InvalidQueryError) {
      err(`  Invalid query: ${error.message}\n`)
      return DEBATE_EXIT_INVALID
    }
    // Agent settings are checked when the first debate seats its roster
    if (error instanceof ConfigError) {
      err(`  Configuration error: ${error.message}\n`)
      return DEBATE_EXIT_INVALID
    }
    if (error instanceof DebateFailedError) {
      err(
        `  Debate failed in ${error.state} after ${String(error.debate.messages.length)} message(s): ${error.message}\n`
      )
      return DEBATE_EXIT_FAILED
    }
    throw error
  }
}

async function streamToTerminal(
  service: DebateService,
  query: string,
  json: boolean,
  out: Writer,
  err: Writer
): Promise<number> {
  let exitCode = DEBATE_EXIT_SUCCESS
  for await (const event of service.streamDebate({ query })) {
    if (!json) renderStreamEvent(event, out)
    if (event.type === 'error') {
      if (event.error.code === 'CONFIG_ERROR') {
        err(`  Configuration error: ${event.error.message}\n`)
        exitCode = DEBATE_EXIT_INVALID
      } else {
        err(`  Error: ${event.error.message}\n`)
        exitCode = event.error.code === 'INVALID_QUERY' ? DEBATE_EXIT_INVALID : DEBATE_EXIT_FAILED
      }
    } else if (event.type === 'audit') {
      exitCode = exitCodeForAudit(event.audit)
    }
  }
  return exitCode
}

function renderStreamEvent(event: DebateStreamEvent, out: Writer): void {
  switch (event.type) {
    case 'session':
      out(`Session ${event.sessionId} (${event.topology})\n\n`)
      break
    case 'message':
      out(formatMessage(event.message) + '\n')
      break
    case 'synthesis':
      out(formatDecisionTable(event.synthesis) + '\n\n')
      break
    case 'audit_status':
      out('Recording audit...\n')
      break
    case 'audit':
      out(formatAudit(event.audit) + '\n')
      break
    case 'error':
      break
  }
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

export function registerDebateCommand(program: Command): void {
  program
    .command('debate <query...>')
    .description('Run a debate on a business decision and print the verdict')
    .option('--topology <name>', 'Debate shape: adversarial or council')
    .option('--backend <name>', 'Agent backend: scripted or llm')
    .option('--stream', 'Print messages as they are produced')
    .option('--no-pacing', 'Skip the cosmetic delays when streaming')
    .option('--no-audit', 'Do not record an audit entry')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-config-dir <dir>', 'Path to project .verdict/ directory')
    .option('--global-config-dir <dir>', 'Path to global .verdict/ directory')
    .action(
      async (
        queryParts: string[],
        opts: {
          topology?: string
          backend?: string
          stream?: boolean
          pacing: boolean
          audit: boolean
          outputFormat: string
          projectConfigDir?: string
          globalConfigDir?: string
        }
      ) => {
        process.exitCode = await runDebateAction(queryParts, {
          ...opts,
          outputFormat: opts.outputFormat === 'json' ? 'json' : 'human',
        })
      }
    )
}
