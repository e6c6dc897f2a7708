/**
 * Error taxonomy tests
 */

import { describe, it, expect } from 'vitest'
import {
  BlockTimeoutError,
  BuildError,
  CancelledError,
  CheckpointNotFoundError,
  ConfigError,
  CycleDetectedError,
  ERROR_KINDS,
  GenerationFailureError,
  MergeConflictError,
  MissingDependencyError,
  NoBranchesAvailableError,
  OrchestrationError,
  PersistenceIOError,
  PlanParseError,
  ResourceLimitError,
  SerializationError,
  ValidationFailureError,
  categoryOf,
  isRecoverable,
  toOrchestrationError,
} from '../src/core/errors.js'

describe('OrchestrationError', () => {
  it('derives code and category from its kind', () => {
    const error = new OrchestrationError('boom', 'io_error', { path: '/tmp/x' })
    expect(error.code).toBe('IO_ERROR')
    expect(error.category).toBe('persistence')
    expect(error.context).toEqual({ path: '/tmp/x' })
    expect(error).toBeInstanceOf(Error)
  })

  it('serializes to JSON with its taxonomy fields', () => {
    const json = new ConfigError('bad value', { key: 'scheduler.max_parallel' }).toJSON()
    expect(json).toMatchObject({
      name: 'ConfigError',
      message: 'bad value',
      code: 'CONFIG_INVALID',
      kind: 'config_invalid',
      category: 'config',
      context: { key: 'scheduler.max_parallel' },
    })
  })

  it('keeps the cause when one is given', () => {
    const cause = new Error('disk full')
    const error = new PersistenceIOError('write failed', {}, cause)
    expect(error.cause).toBe(cause)
  })
})

describe('categoryOf', () => {
  it('assigns every kind to a category', () => {
    const categories = new Set(ERROR_KINDS.map(categoryOf))
    expect(categories).toEqual(new Set(['structural', 'resource', 'execution', 'persistence', 'merge', 'config']))
  })
})

describe('error classes', () => {
  it('formats structural messages', () => {
    expect(new CycleDetectedError(['A', 'B', 'A']).message).toBe(
      'Circular dependency detected in block graph: A -> B -> A',
    )
    const missing = new MissingDependencyError('ghost', { from: 'A', to: 'ghost' })
    expect(missing.message).toBe('Dependency "A" -> "ghost" references unknown block "ghost"')
    expect(missing.context).toEqual({ missing: 'ghost', from: 'A', to: 'ghost' })
  })

  it('maps resource names to kinds', () => {
    const error = new ResourceLimitError('disk', { used: 10 })
    expect(error.kind).toBe('disk_limit_exceeded')
    expect(error.context).toEqual({ resource: 'disk', used: 10 })
  })

  it('lists validation issues in the message', () => {
    expect(new ValidationFailureError('B', ['no tests', 'lint']).message).toBe(
      'Validation failed for block "B": no tests; lint',
    )
    expect(new ValidationFailureError('B', []).message).toBe('Validation failed for block "B"')
  })

  it('describes timeouts and merge failures', () => {
    expect(new BlockTimeoutError('C', 1500).message).toBe('Block "C" exceeded its timeout of 1500ms')
    expect(
      new MergeConflictError([{ path: 'src/a.ts', branchA: 'x', branchB: 'y' }]).message,
    ).toBe('Selective merge has 1 unresolved conflict(s): src/a.ts (x vs y)')
    expect(new NoBranchesAvailableError(3).kind).toBe('no_branches_available')
  })
})

describe('toOrchestrationError', () => {
  it('passes orchestration errors through unchanged', () => {
    const original = new CheckpointNotFoundError('ckpt-1')
    expect(toOrchestrationError(original)).toBe(original)
  })

  it('wraps plain errors as generation failures by default', () => {
    const cause = new Error('model refused')
    const error = toOrchestrationError(cause, undefined, { blockId: 'A' })
    expect(error).toBeInstanceOf(GenerationFailureError)
    expect(error.message).toBe('model refused')
    expect(error.context).toEqual({ blockId: 'A' })
    expect(error.cause).toBe(cause)
  })

  it('uses the requested fallback kind', () => {
    expect(toOrchestrationError('nope', 'build_error')).toBeInstanceOf(BuildError)
    expect(toOrchestrationError('nope', 'serialization_error')).toBeInstanceOf(SerializationError)
    expect(toOrchestrationError('nope', 'io_error')).toBeInstanceOf(PersistenceIOError)
    expect(toOrchestrationError('nope', 'timeout').kind).toBe('timeout')
  })
})

describe('isRecoverable', () => {
  it('retries execution and resource failures', () => {
    expect(isRecoverable(new GenerationFailureError('x'))).toBe(true)
    expect(isRecoverable(new ResourceLimitError('memory'))).toBe(true)
    expect(isRecoverable(new SerializationError('x'))).toBe(true)
  })

  it('never retries structural, merge, config or cancellation errors', () => {
    expect(isRecoverable(new CycleDetectedError(['A', 'A']))).toBe(false)
    expect(isRecoverable(new NoBranchesAvailableError(0))).toBe(false)
    expect(isRecoverable(new PlanParseError('x'))).toBe(false)
    expect(isRecoverable(new CancelledError('stop'))).toBe(false)
    expect(isRecoverable(new CheckpointNotFoundError('ckpt-1'))).toBe(false)
  })
})
