/**
 * Contract of the layered configuration. Build one with `createConfigSystem()`.
 *
 * Layers, later ones winning:
 *   defaults, ~/.verdict/config.yaml, ./.verdict/config.yaml, VERDICT_* env vars, CLI flags
 */

import type { VerdictConfig, PartialVerdictConfig } from './config-schema.js'

export interface ConfigSystemOptions {
  /** Default: <cwd>/.verdict */
  projectConfigDir?: string
  /** Default: ~/.verdict */
  globalConfigDir?: string
  /** Top layer, built from command-line flags */
  cliOverrides?: PartialVerdictConfig
  /** Source of VERDICT_* overrides (default: process.env) */
  env?: NodeJS.ProcessEnv
}

export interface ConfigSystem {
  /**
   * Read every layer, merge and validate.
   * @throws {ConfigError} on unreadable YAML or a document the schema refuses
   */
  load(): Promise<void>

  /** @throws {ConfigError} before `load()` */
  getConfig(): VerdictConfig

  /** Dot-notation lookup such as "agents.retry.max_attempts"; undefined when absent */
  get(key: string): unknown

  /**
   * Write one scalar or list into the project file, then reload.
   * @throws {ConfigError} for unknown keys, whole sections and invalid values
   */
  set(key: string, value: unknown): Promise<void>

  /** Merged config with credential values replaced by "***" */
  getMasked(): Record<string, unknown>

  readonly isLoaded: boolean
}
