/**
 * `verdict config show` and `verdict config set <key> <value>`.
 *
 * Exit codes: 0 success, 1 unexpected error, 2 invalid key, value or config file.
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { ConfigError, toError } from '../../core/errors.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import { createLogger } from '../../utils/logger.js'
import type { Writer } from '../formatters/streaming.js'
import { loadCliConfig, type ConfigDirOptions } from '../utils/load-config.js'

const logger = createLogger('config-cmd')

export const CONFIG_EXIT_SUCCESS = 0
export const CONFIG_EXIT_ERROR = 1
export const CONFIG_EXIT_INVALID = 2

export interface ConfigCommandDeps {
  stdout?: Writer
  stderr?: Writer
}

interface Io {
  out: Writer
  err: Writer
}

function resolveIo(deps: ConfigCommandDeps): Io {
  return {
    out: deps.stdout ?? ((line) => process.stdout.write(line)),
    err: deps.stderr ?? ((line) => process.stderr.write(line)),
  }
}

/** CLI values arrive as strings; a list key takes comma-separated input */
export function coerceValue(raw: string, existing?: unknown): unknown {
  const trimmed = raw.trim()
  if (Array.isArray(existing)) {
    return trimmed === '' ? [] : trimmed.split(',').map((item) => item.trim())
  }
  switch (trimmed) {
    case 'true':
      return true
    case 'false':
      return false
    case 'null':
      return null
  }
  if (/^-?\d+$/.test(trimmed)) return parseInt(trimmed, 10)
  if (/^-?\d*\.\d+$/.test(trimmed)) return parseFloat(trimmed)
  return trimmed
}

/** Map a failure to an exit code, reporting it on stderr */
function reportFailure(error: unknown, prefix: string, io: Io): number {
  if (error instanceof ConfigError) {
    io.err(`  ${prefix}: ${error.message}\n`)
    return CONFIG_EXIT_INVALID
  }
  const cause = toError(error)
  logger.error({ err: cause.message }, 'Config command failed')
  io.err(`  Error: ${cause.message}\n`)
  return CONFIG_EXIT_ERROR
}

async function load(opts: ConfigDirOptions, io: Io): Promise<ConfigSystem | number> {
  try {
    return await loadCliConfig(opts)
  } catch (error) {
    return reportFailure(error, 'Configuration error', io)
  }
}

// ---------------------------------------------------------------------------
// config show
// ---------------------------------------------------------------------------

export interface ConfigShowOptions extends ConfigDirOptions {
  format?: 'yaml' | 'json'
}

export async function runConfigShow(opts: ConfigShowOptions = {}, deps: ConfigCommandDeps = {}): Promise<number> {
  const io = resolveIo(deps)
  const system = await load(opts, io)
  if (typeof system === 'number') return system

  const masked = system.getMasked()
  if (opts.format === 'json') {
    io.out(JSON.stringify(masked, null, 2) + '\n')
  } else {
    io.out('# Verdict Configuration (credentials masked)\n\n' + yaml.dump(masked))
  }
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// config set
// ---------------------------------------------------------------------------

export async function runConfigSet(
  key: string,
  rawValue: string,
  opts: ConfigDirOptions = {},
  deps: ConfigCommandDeps = {}
): Promise<number> {
  const io = resolveIo(deps)
  if (key.trim() === '') {
    io.err('  Error: key must not be empty\n')
    return CONFIG_EXIT_INVALID
  }

  const system = await load(opts, io)
  if (typeof system === 'number') return system

  const value = coerceValue(rawValue, system.get(key))
  try {
    await system.set(key, value)
  } catch (error) {
    return reportFailure(error, 'Error', io)
  }
  io.out(`  Set ${key} = ${JSON.stringify(value)}\n`)
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

export function registerConfigCommand(program: Command): void {
  const configCmd = program.command('config').description('View and modify verdict configuration')

  configCmd
    .command('show')
    .description('Display the merged configuration with credentials masked')
    .option('--output-format <format>', 'Output format: yaml (default) or json', 'yaml')
    .option('--project-config-dir <dir>', 'Path to project .verdict/ directory')
    .option('--global-config-dir <dir>', 'Path to global .verdict/ directory')
    .action(async (opts: ConfigDirOptions & { outputFormat: string }) => {
      process.exitCode = await runConfigShow({
        ...opts,
        format: opts.outputFormat === 'json' ? 'json' : 'yaml',
      })
    })

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value using dot-notation (e.g. agents.backend llm)')
    .option('--project-config-dir <dir>', 'Path to project .verdict/ directory')
    .option('--global-config-dir <dir>', 'Path to global .verdict/ directory')
    .action(async (key: string, value: string, opts: ConfigDirOptions) => {
      process.exitCode = await runConfigSet(key, value, opts)
    })
}
