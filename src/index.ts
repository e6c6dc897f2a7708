/**
 * Blocksmith - Main module exports
 * Public API surface for the orchestration engine
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger, setLogLevel } from './utils/logger.js'
export * from './utils/helpers.js'

// Orchestrator
export { createOrchestrator, resolveDatabasePath } from './core/orchestrator-impl.js'
export type { Orchestrator, OrchestratorConfig, ExploreOptions, RunPlanOptions } from './core/orchestrator.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { OrchestratorEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Dependency Injection
export type { BaseService } from './core/di.js'
export { ServiceRegistry } from './core/di.js'

// Modules
export * from './modules/config/index.js'
export * from './modules/block-graph/index.js'
export * from './modules/resource-monitor/index.js'
export * from './modules/chunker/index.js'
export * from './modules/checkpoint/index.js'
export * from './modules/recovery/index.js'
export * from './modules/scheduler/index.js'
export * from './modules/branch-coordinator/index.js'
export * from './modules/worker-pool/index.js'

// Persistence
export { DatabaseWrapper, createDatabaseService, IN_MEMORY_DATABASE } from './persistence/database.js'
export type { DatabaseService } from './persistence/database.js'
export { runMigrations } from './persistence/migrations/index.js'
