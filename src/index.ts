/**
 * verdict - Main module exports
 * Public API surface for embedding the debate engine
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger, setConfiguredLogLevel } from './utils/logger.js'
export type { LogLevel, LoggerOptions } from './utils/logger.js'
export * from './utils/helpers.js'

// Event Bus
export type { TypedEventBus, EventHandler } from './core/event-bus.js'
export type { DebateEvents } from './core/event-bus.types.js'
export { createEventBus, TypedEventBusImpl } from './core/event-bus.js'

// Configuration
export * from './modules/config/index.js'

// Agents
export * from './modules/agents/index.js'

// Debate state machine and streaming driver
export * from './modules/debate/index.js'

// Decision heuristics
export * from './modules/decision/index.js'

// Audit
export * from './modules/audit/index.js'

// Sessions
export * from './modules/session-store/index.js'

// Service facade
export * from './modules/debate-service/index.js'

// HTTP transport
export * from './server/index.js'
