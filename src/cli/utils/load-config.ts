import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { PartialVerdictConfig } from '../../modules/config/config-schema.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import { setConfiguredLogLevel } from '../../utils/logger.js'

/** `--project-config-dir` / `--global-config-dir`, shared by every command */
export interface ConfigDirOptions {
  projectConfigDir?: string
  globalConfigDir?: string
}

/**
 * Load the layered config with `cliOverrides` on top and apply its log level.
 * @throws {ConfigError}
 */
export async function loadCliConfig(
  dirs: ConfigDirOptions,
  cliOverrides: PartialVerdictConfig = {}
): Promise<ConfigSystem> {
  const system = createConfigSystem({
    projectConfigDir: dirs.projectConfigDir,
    globalConfigDir: dirs.globalConfigDir,
    cliOverrides,
  })
  await system.load()
  setConfiguredLogLevel(system.getConfig().global.log_level)
  return system
}
