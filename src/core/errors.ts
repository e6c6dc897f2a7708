/**
 * Error definitions for blocksmith
 * Provides the structured error taxonomy for all orchestration operations.
 *
 * Every error carries a `category` (how it propagates) and a `kind` (which
 * recovery policy applies). Collaborator failures enter the taxonomy only
 * through `toOrchestrationError()`.
 */

// ---------------------------------------------------------------------------
// Taxonomy tags
// ---------------------------------------------------------------------------

export type StructuralErrorKind = 'cycle_detected' | 'missing_dependency' | 'duplicate_block'

export type ResourceErrorKind =
  | 'memory_limit_exceeded'
  | 'cpu_limit_exceeded'
  | 'disk_limit_exceeded'

export type ExecutionErrorKind =
  | 'generation_failure'
  | 'validation_failure'
  | 'build_error'
  | 'timeout'
  | 'cancelled'

export type PersistenceErrorKind = 'checkpoint_not_found' | 'serialization_error' | 'io_error'

export type MergeErrorKind = 'branch_not_found' | 'merge_conflict' | 'no_branches_available'

export type ConfigErrorKind = 'config_invalid' | 'plan_parse_error'

export type ErrorKind =
  | StructuralErrorKind
  | ResourceErrorKind
  | ExecutionErrorKind
  | PersistenceErrorKind
  | MergeErrorKind
  | ConfigErrorKind

export type ErrorCategory =
  | 'structural'
  | 'resource'
  | 'execution'
  | 'persistence'
  | 'merge'
  | 'config'

export const ERROR_KINDS = [
  'cycle_detected',
  'missing_dependency',
  'duplicate_block',
  'memory_limit_exceeded',
  'cpu_limit_exceeded',
  'disk_limit_exceeded',
  'generation_failure',
  'validation_failure',
  'build_error',
  'timeout',
  'cancelled',
  'checkpoint_not_found',
  'serialization_error',
  'io_error',
  'branch_not_found',
  'merge_conflict',
  'no_branches_available',
  'config_invalid',
  'plan_parse_error',
] as const satisfies readonly ErrorKind[]

const CATEGORY_BY_KIND: Record<ErrorKind, ErrorCategory> = {
  cycle_detected: 'structural',
  missing_dependency: 'structural',
  duplicate_block: 'structural',
  memory_limit_exceeded: 'resource',
  cpu_limit_exceeded: 'resource',
  disk_limit_exceeded: 'resource',
  generation_failure: 'execution',
  validation_failure: 'execution',
  build_error: 'execution',
  timeout: 'execution',
  cancelled: 'execution',
  checkpoint_not_found: 'persistence',
  serialization_error: 'persistence',
  io_error: 'persistence',
  branch_not_found: 'merge',
  merge_conflict: 'merge',
  no_branches_available: 'merge',
  config_invalid: 'config',
  plan_parse_error: 'config',
}

export function categoryOf(kind: ErrorKind): ErrorCategory {
  return CATEGORY_BY_KIND[kind]
}

// ---------------------------------------------------------------------------
// Base error
// ---------------------------------------------------------------------------

/** Base error class for all blocksmith errors */
export class OrchestrationError extends Error {
  public readonly code: string
  public readonly kind: ErrorKind
  public readonly category: ErrorCategory
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    kind: ErrorKind,
    context: Record<string, unknown> = {},
    options: { cause?: unknown } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'OrchestrationError'
    this.kind = kind
    this.code = kind.toUpperCase()
    this.category = categoryOf(kind)
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, OrchestrationError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      kind: this.kind,
      category: this.category,
      context: this.context,
      stack: this.stack,
    }
  }
}

// ---------------------------------------------------------------------------
// Structural
// ---------------------------------------------------------------------------

/** Raised when the gating-edge subgraph contains a cycle */
export class CycleDetectedError extends OrchestrationError {
  public readonly path: string[]

  constructor(path: string[]) {
    super(`Circular dependency detected in block graph: ${path.join(' -> ')}`, 'cycle_detected', {
      path,
    })
    this.name = 'CycleDetectedError'
    this.path = path
  }
}

export class MissingDependencyError extends OrchestrationError {
  /** `missing` is whichever end of the edge `from -> to` names no block */
  constructor(missing: string, edge: { from: string; to: string }) {
    super(`Dependency "${edge.from}" -> "${edge.to}" references unknown block "${missing}"`, 'missing_dependency', {
      missing,
      from: edge.from,
      to: edge.to,
    })
    this.name = 'MissingDependencyError'
  }
}

export class DuplicateBlockError extends OrchestrationError {
  constructor(blockId: string) {
    super(`Block identifier "${blockId}" is defined more than once`, 'duplicate_block', {
      blockId,
    })
    this.name = 'DuplicateBlockError'
  }
}

// ---------------------------------------------------------------------------
// Resource
// ---------------------------------------------------------------------------

export type ResourceName = 'memory' | 'cpu' | 'disk'

const RESOURCE_KIND: Record<ResourceName, ResourceErrorKind> = {
  memory: 'memory_limit_exceeded',
  cpu: 'cpu_limit_exceeded',
  disk: 'disk_limit_exceeded',
}

export class ResourceLimitError extends OrchestrationError {
  public readonly resource: ResourceName

  constructor(resource: ResourceName, context: Record<string, unknown> = {}) {
    super(`${resource} limit exceeded`, RESOURCE_KIND[resource], { resource, ...context })
    this.name = 'ResourceLimitError'
    this.resource = resource
  }
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

export class GenerationFailureError extends OrchestrationError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'generation_failure', context, { cause })
    this.name = 'GenerationFailureError'
  }
}

export class ValidationFailureError extends OrchestrationError {
  public readonly issues: string[]

  constructor(blockId: string, issues: string[], context: Record<string, unknown> = {}) {
    super(
      `Validation failed for block "${blockId}"${issues.length > 0 ? `: ${issues.join('; ')}` : ''}`,
      'validation_failure',
      { blockId, issues, ...context }
    )
    this.name = 'ValidationFailureError'
    this.issues = issues
  }
}

export class BuildError extends OrchestrationError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'build_error', context, { cause })
    this.name = 'BuildError'
  }
}

export class BlockTimeoutError extends OrchestrationError {
  constructor(blockId: string, timeoutMs: number) {
    super(
      `Block "${blockId}" exceeded its timeout of ${String(timeoutMs)}ms`,
      'timeout',
      { blockId, timeoutMs }
    )
    this.name = 'BlockTimeoutError'
  }
}

export class CancelledError extends OrchestrationError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'cancelled', context)
    this.name = 'CancelledError'
  }
}

// ---------------------------------------------------------------------------
// Persistence
// ---------------------------------------------------------------------------

export class CheckpointNotFoundError extends OrchestrationError {
  constructor(checkpointId: string) {
    super(`Checkpoint not found: ${checkpointId}`, 'checkpoint_not_found', { checkpointId })
    this.name = 'CheckpointNotFoundError'
  }
}

export class SerializationError extends OrchestrationError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'serialization_error', context, { cause })
    this.name = 'SerializationError'
  }
}

export class PersistenceIOError extends OrchestrationError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'io_error', context, { cause })
    this.name = 'PersistenceIOError'
  }
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

export class BranchNotFoundError extends OrchestrationError {
  constructor(branchId: string) {
    super(`Branch not found: ${branchId}`, 'branch_not_found', { branchId })
    this.name = 'BranchNotFoundError'
  }
}

/** One unresolved overlap between two branches' edits of the same file */
export interface ConflictDescriptor {
  path: string
  branchA: string
  branchB: string
}

export class MergeConflictError extends OrchestrationError {
  public readonly conflicts: ConflictDescriptor[]

  constructor(conflicts: ConflictDescriptor[]) {
    super(
      `Selective merge has ${String(conflicts.length)} unresolved conflict(s): ${conflicts
        .map((c) => `${c.path} (${c.branchA} vs ${c.branchB})`)
        .join(', ')}`,
      'merge_conflict',
      { conflicts }
    )
    this.name = 'MergeConflictError'
    this.conflicts = conflicts
  }
}

export class NoBranchesAvailableError extends OrchestrationError {
  constructor(branchCount: number) {
    super(
      `No branch reached the implemented state (${String(branchCount)} branch(es) considered)`,
      'no_branches_available',
      { branchCount }
    )
    this.name = 'NoBranchesAvailableError'
  }
}

// ---------------------------------------------------------------------------
// Config / input
// ---------------------------------------------------------------------------

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends OrchestrationError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'config_invalid', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a plan file cannot be read, parsed or validated */
export class PlanParseError extends OrchestrationError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'plan_parse_error', context, { cause })
    this.name = 'PlanParseError'
  }
}

// ---------------------------------------------------------------------------
// Conversion boundary
// ---------------------------------------------------------------------------

/**
 * Map an arbitrary thrown value into the taxonomy. Values that already are
 * orchestration errors pass through; anything else is wrapped as
 * `fallbackKind` with the original kept as `cause`.
 */
export function toOrchestrationError(
  err: unknown,
  fallbackKind: ExecutionErrorKind | PersistenceErrorKind = 'generation_failure',
  context: Record<string, unknown> = {}
): OrchestrationError {
  if (err instanceof OrchestrationError) return err

  const message = err instanceof Error ? err.message : String(err)
  switch (fallbackKind) {
    case 'generation_failure':
      return new GenerationFailureError(message, context, err)
    case 'build_error':
      return new BuildError(message, context, err)
    case 'serialization_error':
      return new SerializationError(message, context, err)
    case 'io_error':
      return new PersistenceIOError(message, context, err)
    default:
      return new OrchestrationError(message, fallbackKind, context, { cause: err })
  }
}

/** Structural, merge and config errors are never retried, nor are cancellations */
export function isRecoverable(error: OrchestrationError): boolean {
  if (error.category === 'structural' || error.category === 'merge' || error.category === 'config') {
    return false
  }
  return error.kind !== 'checkpoint_not_found' && error.kind !== 'cancelled'
}
