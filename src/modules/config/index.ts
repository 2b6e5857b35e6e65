/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  VerdictConfigSchema,
  PartialVerdictConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
} from './config-schema.js'
export type {
  VerdictConfig,
  PartialVerdictConfig,
  AgentSettings,
  DecisionSettings,
  PacingSettings,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
