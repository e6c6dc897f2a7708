import { describe, it, expect } from 'vitest'
import { canTransition, transitionBlock, type BlockState } from '../block-state.js'

describe('block state machine', () => {
  it('follows the happy path and counts attempts', () => {
    const state: BlockState = { status: 'not_started', reason: '', attempts: 0 }
    transitionBlock('A', state, 'ready', 'prerequisites satisfied')
    transitionBlock('A', state, 'in_progress', 'started')
    transitionBlock('A', state, 'failed', 'generation failed')
    transitionBlock('A', state, 'in_progress', 'retry')
    const previous = transitionBlock('A', state, 'completed', 'validation passed')

    expect(previous).toBe('in_progress')
    expect(state).toEqual({ status: 'completed', reason: 'validation passed', attempts: 2 })
  })

  it('rejects transitions out of terminal states', () => {
    const state: BlockState = { status: 'completed', reason: 'done', attempts: 1 }
    expect(() => transitionBlock('A', state, 'in_progress', 'again')).toThrow(
      'Invalid block transition for "A": completed → in_progress. Allowed from completed: []',
    )
    expect(state.status).toBe('completed')
  })

  it('only leaves blocked for ready or deferred', () => {
    expect(canTransition('blocked', 'ready')).toBe(true)
    expect(canTransition('blocked', 'deferred')).toBe(true)
    expect(canTransition('blocked', 'in_progress')).toBe(false)
  })

  it('never starts a block that was not ready', () => {
    expect(canTransition('not_started', 'in_progress')).toBe(false)
  })
})
