/**
 * ConfigSystem implementation: loads configuration in hierarchy order and
 * exposes get/set/getMasked operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.verdict/config.yaml)
 *     → project config      (./.verdict/config.yaml)
 *     → environment vars    (VERDICT_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, writeFile, mkdir, access } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { isPlainObject } from '../../utils/helpers.js'
import { ConfigError } from '../../core/errors.js'
import {
  VerdictConfigSchema,
  PartialVerdictConfigSchema,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
  type VerdictConfig,
  type PartialVerdictConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
import { deepMask } from '../../cli/utils/masking.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

/** Merge `override` into a copy of `base`; arrays and scalars replace, objects recurse */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const existing = result[key]
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of VERDICT_ environment variable names to config paths.
 * Values are coerced to boolean/number where they look like one.
 */
const ENV_VAR_MAP: Record<string, string> = {
  VERDICT_LOG_LEVEL: 'global.log_level',
  VERDICT_AGENT_BACKEND: 'agents.backend',
  VERDICT_AGENT_MODEL: 'agents.model',
  VERDICT_AGENT_MAX_TOKENS: 'agents.max_tokens',
  VERDICT_AGENT_TIMEOUT_MS: 'agents.timeout_ms',
  VERDICT_RETRY_MAX_ATTEMPTS: 'agents.retry.max_attempts',
  VERDICT_RETRY_BASE_DELAY_MS: 'agents.retry.base_delay_ms',
  VERDICT_TOPOLOGY: 'debate.topology',
  VERDICT_PACING_ENABLED: 'pacing.enabled',
  VERDICT_THINKING_MS: 'pacing.thinking_ms',
  VERDICT_MESSAGE_GAP_MS: 'pacing.message_gap_ms',
  VERDICT_AUDIT_ENABLED: 'audit.enabled',
  VERDICT_SESSION_TTL_MS: 'sessions.ttl_ms',
  VERDICT_HOST: 'server.host',
  VERDICT_PORT: 'server.port',
}

/** Comma-separated list variables */
const ENV_LIST_VAR_MAP: Record<string, string> = {
  VERDICT_BLOCK_PHRASES: 'decision.block_phrases',
  VERDICT_SHIP_PHRASES: 'decision.ship_phrases',
}

function coerceEnvValue(rawValue: string): unknown {
  if (rawValue === 'true') return true
  if (rawValue === 'false') return false
  if (/^\d+$/.test(rawValue)) return parseInt(rawValue, 10)
  if (/^\d*\.\d+$/.test(rawValue)) return parseFloat(rawValue)
  return rawValue
}

/**
 * Read relevant environment variables and return a partial config overlay.
 */
function readEnvOverrides(env: NodeJS.ProcessEnv): PartialVerdictConfig {
  let overrides: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined) continue
    overrides = setByPath(overrides, configPath, coerceEnvValue(rawValue))
  }
  for (const [envKey, configPath] of Object.entries(ENV_LIST_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined) continue
    const items = rawValue
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
    overrides = setByPath(overrides, configPath, items)
  }

  const parsed = PartialVerdictConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor / setter
// ---------------------------------------------------------------------------

export function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/**
 * Return a copy of `obj` with `path` set to `value`.
 * Creates intermediate objects as needed.
 */
export function setByPath(
  obj: Record<string, unknown>,
  path: string,
  value: unknown
): Record<string, unknown> {
  const [head, ...rest] = path.split('.')
  if (head === undefined || head === '') return { ...obj }
  if (rest.length === 0) return { ...obj, [head]: value }
  const child = obj[head]
  return {
    ...obj,
    [head]: setByPath(isPlainObject(child) ? child : {}, rest.join('.'), value),
  }
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: VerdictConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialVerdictConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.verdict')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.verdict')
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    const layers: { source: string; values: Record<string, unknown> | null }[] = [
      { source: 'global', values: await this._loadYamlFile(join(this._globalConfigDir, 'config.yaml')) },
      { source: 'project', values: await this._loadYamlFile(join(this._projectConfigDir, 'config.yaml')) },
      { source: 'env', values: readEnvOverrides(this._env) },
      { source: 'cli', values: this._cliOverrides },
    ]

    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)
    for (const layer of layers) {
      if (layer.values === null || Object.keys(layer.values).length === 0) continue
      merged = deepMerge(merged, layer.values)
      logger.trace({ source: layer.source }, 'Applied config layer')
    }

    const result = VerdictConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(
        `Configuration validation failed:\n${formatIssues(result.error.issues)}`,
        { issues: result.error.issues }
      )
    }

    this._config = result.data
    logger.debug('Configuration loaded successfully')
  }

  getConfig(): VerdictConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  async set(key: string, value: unknown): Promise<void> {
    const existing = getByPath(this.getConfig(), key)

    if (existing === undefined) {
      throw new ConfigError(`Unknown config key: ${key}`, { key })
    }
    // Whole sections cannot be replaced; lists can
    if (isPlainObject(existing)) {
      throw new ConfigError(
        `Cannot set object key "${key}"; use a more specific dot-notation path`,
        { key }
      )
    }

    const projectConfigPath = join(this._projectConfigDir, 'config.yaml')
    const projectConfigRaw = (await this._loadYamlFile(projectConfigPath)) ?? {}
    const updated = setByPath(projectConfigRaw, key, value)

    const partial = PartialVerdictConfigSchema.safeParse(updated)
    if (!partial.success) {
      throw new ConfigError(`Invalid value for "${key}":\n${formatIssues(partial.error.issues)}`, {
        key,
        value,
        issues: partial.error.issues,
      })
    }

    await mkdir(this._projectConfigDir, { recursive: true })
    await writeFile(projectConfigPath, yaml.dump(updated), 'utf-8')

    await this.load()
  }

  getMasked(): Record<string, unknown> {
    const masked = deepMask(this.getConfig())
    return isPlainObject(masked) ? masked : {}
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<Record<string, unknown> | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      parsed = yaml.load(await readFile(filePath, 'utf-8'))
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    // An empty file loads as undefined
    if (parsed === undefined || parsed === null) return {}

    if (isPlainObject(parsed)) {
      const version = parsed['config_format_version']
      if (typeof version === 'string' && !SUPPORTED_CONFIG_FORMAT_VERSIONS.includes(version)) {
        throw new ConfigError(
          `Unsupported config_format_version "${version}" in ${filePath}. Supported: ${SUPPORTED_CONFIG_FORMAT_VERSIONS.join(', ')}`,
          { filePath, version }
        )
      }
    }

    const result = PartialVerdictConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
