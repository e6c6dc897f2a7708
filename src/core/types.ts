/**
 * Core types for blocksmith
 * Shared type definitions used across all modules
 */

/** Unique identifier for an implementation block */
export type BlockId = string

/** Unique identifier for a checkpoint */
export type CheckpointId = string

/** Unique identifier for an implementation branch */
export type BranchId = string

/** Runtime status of an implementation block */
export type BlockStatus =
  | 'not_started'
  | 'ready'
  | 'blocked'
  | 'in_progress'
  | 'completed'
  | 'completed_with_issues'
  | 'failed'
  | 'deferred'

/** Statuses that end a block's participation in the current pass */
export const TERMINAL_BLOCK_STATUSES: readonly BlockStatus[] = [
  'completed',
  'completed_with_issues',
  'failed',
  'deferred',
]

/** Statuses that satisfy a gating dependency */
export const SUCCESSFUL_BLOCK_STATUSES: readonly BlockStatus[] = ['completed', 'completed_with_issues']

export function isTerminalStatus(status: BlockStatus): boolean {
  return TERMINAL_BLOCK_STATUSES.includes(status)
}

export function isSuccessfulStatus(status: BlockStatus): boolean {
  return SUCCESSFUL_BLOCK_STATUSES.includes(status)
}

/** Kind of edge between a block and one of its prerequisites */
export type DependencyKind =
  | 'required_before'
  | 'required_for_completion'
  | 'influences'
  | 'provides_information'
  | 'alternative'

/** Only these kinds gate execution */
export const GATING_DEPENDENCY_KINDS: readonly DependencyKind[] = [
  'required_before',
  'required_for_completion',
]

export function isGatingKind(kind: DependencyKind): boolean {
  return GATING_DEPENDENCY_KINDS.includes(kind)
}

/** One execution step within a block, handed to the generation collaborator */
export interface ExecutionStep {
  id: string
  description: string
  /** Optional steps are dropped by the simplified variant of a block */
  optional: boolean
}

/** Unit of schedulable work produced by the planning collaborator */
export interface ImplementationBlock {
  id: BlockId
  description: string
  /** Base priority score */
  priority: number
  /** Risk on a 0-10 scale */
  riskFactor: number
  securityCritical: boolean
  steps: ExecutionStep[]
  estimatedEffortMs: number
  validationCriteria: string[]
}

/** Directed edge: `from` depends on prerequisite `to` */
export interface BlockDependency {
  from: BlockId
  to: BlockId
  kind: DependencyKind
}

/** Content produced for one execution step */
export interface Artifact {
  path: string
  content: string
  blockId: BlockId
  stepId: string
}

/** Severity level for log messages */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'
