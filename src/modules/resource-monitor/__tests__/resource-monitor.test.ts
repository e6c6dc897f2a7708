/**
 * Unit tests for ResourceMonitorImpl
 *
 * Uses a scripted sampler and a manual clock so no real process metrics are read.
 */

import { describe, it, expect, vi } from 'vitest'
import { ResourceMonitorImpl, classifyUsage, usagePercentage } from '../resource-monitor-impl.js'
import type { ResourceSampler, ResourceUsage } from '../resource-monitor.js'
import { createEventBus } from '../../../core/event-bus.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const MB = 1024 * 1024

function scriptedSampler(readings: ResourceUsage[]): ResourceSampler & { calls: number } {
  const sampler = {
    calls: 0,
    sample(): ResourceUsage {
      const reading = readings[Math.min(sampler.calls, readings.length - 1)]
      sampler.calls++
      if (reading === undefined) throw new Error('no readings scripted')
      return reading
    },
  }
  return sampler
}

function manualClock(start = 1_000): { now: () => number; advance: (ms: number) => void; set: (t: number) => void } {
  let t = start
  return {
    now: () => t,
    advance: (ms: number) => {
      t += ms
    },
    set: (value: number) => {
      t = value
    },
  }
}

const LIMITS = { memoryBytes: 100 * MB, cpuPercent: 80, diskBytes: 1000 * MB }

// ---------------------------------------------------------------------------
// update()
// ---------------------------------------------------------------------------

describe('ResourceMonitorImpl.update()', () => {
  it('records the first sample unconditionally', () => {
    const sampler = scriptedSampler([{ memoryBytes: 10 * MB, cpuPercent: 5, diskBytes: 1 * MB }])
    const clock = manualClock()
    const monitor = new ResourceMonitorImpl({ limits: LIMITS, sampler, clock: clock.now })

    expect(monitor.getSample()).toBeNull()
    expect(monitor.update()).toBe(true)
    expect(monitor.getSample()?.usage.memoryBytes).toBe(10 * MB)
    expect(monitor.getSample()?.timestamp).toBe(1_000)
  })

  it('skips sampling until the interval has elapsed', () => {
    const sampler = scriptedSampler([
      { memoryBytes: 10 * MB, cpuPercent: 5, diskBytes: 0 },
      { memoryBytes: 20 * MB, cpuPercent: 5, diskBytes: 0 },
    ])
    const clock = manualClock()
    const monitor = new ResourceMonitorImpl({
      limits: LIMITS,
      sampler,
      clock: clock.now,
      sampleIntervalMs: 500,
    })

    monitor.update()
    clock.advance(499)
    expect(monitor.update()).toBe(false)
    expect(sampler.calls).toBe(1)

    clock.advance(1)
    expect(monitor.update()).toBe(true)
    expect(sampler.calls).toBe(2)
    expect(monitor.getSample()?.usage.memoryBytes).toBe(20 * MB)
  })

  it('discards readings when the clock moves backwards', () => {
    const sampler = scriptedSampler([{ memoryBytes: 10 * MB, cpuPercent: 5, diskBytes: 0 }])
    const clock = manualClock(5_000)
    const monitor = new ResourceMonitorImpl({
      limits: LIMITS,
      sampler,
      clock: clock.now,
      sampleIntervalMs: 0,
    })

    monitor.update()
    clock.set(4_000)
    expect(monitor.update()).toBe(false)
    expect(monitor.getSample()?.timestamp).toBe(5_000)
  })

  it('keeps a monotonic memory high-watermark', () => {
    const sampler = scriptedSampler([
      { memoryBytes: 30 * MB, cpuPercent: 0, diskBytes: 0 },
      { memoryBytes: 70 * MB, cpuPercent: 0, diskBytes: 0 },
      { memoryBytes: 40 * MB, cpuPercent: 0, diskBytes: 0 },
    ])
    const clock = manualClock()
    const monitor = new ResourceMonitorImpl({
      limits: LIMITS,
      sampler,
      clock: clock.now,
      sampleIntervalMs: 10,
    })

    monitor.update()
    clock.advance(10)
    monitor.update()
    clock.advance(10)
    monitor.update()

    const sample = monitor.getSample()
    expect(sample?.usage.memoryBytes).toBe(40 * MB)
    expect(sample?.memoryHighWatermarkBytes).toBe(70 * MB)
  })

  it('returns a frozen copy from getSample()', () => {
    const sampler = scriptedSampler([{ memoryBytes: 1, cpuPercent: 1, diskBytes: 1 }])
    const monitor = new ResourceMonitorImpl({ limits: LIMITS, sampler, clock: () => 1 })
    monitor.update()
    const sample = monitor.getSample()
    expect(Object.isFrozen(sample)).toBe(true)
    expect(Object.isFrozen(sample?.usage)).toBe(true)
  })
})

// ---------------------------------------------------------------------------
// checkLimits() and percentages
// ---------------------------------------------------------------------------

describe('ResourceMonitorImpl.checkLimits()', () => {
  it('classifies each resource independently', () => {
    const sampler = scriptedSampler([
      // memory 95% (warning), cpu 100/80 = 125% (exceeded), disk 10% (normal)
      { memoryBytes: 95 * MB, cpuPercent: 100, diskBytes: 100 * MB },
    ])
    const monitor = new ResourceMonitorImpl({ limits: LIMITS, sampler, clock: () => 1 })

    expect(monitor.checkLimits()).toEqual({ memory: 'warning', cpu: 'exceeded', disk: 'normal' })
    expect(monitor.memoryPercentage()).toBe(95)
    expect(monitor.cpuPercentage()).toBe(125)
    expect(monitor.diskPercentage()).toBe(10)
  })

  it('samples on the first checkLimits() call', () => {
    const sampler = scriptedSampler([{ memoryBytes: 0, cpuPercent: 0, diskBytes: 0 }])
    const monitor = new ResourceMonitorImpl({ limits: LIMITS, sampler, clock: () => 1 })
    monitor.checkLimits()
    expect(sampler.calls).toBe(1)
  })

  it('emits resource events for warning and exceeded levels', () => {
    const bus = createEventBus()
    const warnings = vi.fn()
    const exceeded = vi.fn()
    bus.on('resource:warning', warnings)
    bus.on('resource:exceeded', exceeded)

    const sampler = scriptedSampler([{ memoryBytes: 150 * MB, cpuPercent: 76, diskBytes: 0 }])
    const monitor = new ResourceMonitorImpl({ limits: LIMITS, sampler, clock: () => 1 }, bus)
    monitor.checkLimits()

    expect(exceeded).toHaveBeenCalledWith({ resource: 'memory', percentage: 150 })
    expect(warnings).toHaveBeenCalledWith({ resource: 'cpu', percentage: 95 })
  })

  it('honours a custom warning threshold', () => {
    const sampler = scriptedSampler([{ memoryBytes: 60 * MB, cpuPercent: 0, diskBytes: 0 }])
    const monitor = new ResourceMonitorImpl({
      limits: LIMITS,
      sampler,
      clock: () => 1,
      warningThresholdPercent: 50,
    })
    expect(monitor.checkLimits().memory).toBe('warning')
  })
})

describe('usagePercentage / classifyUsage', () => {
  it('treats a non-positive limit as unlimited', () => {
    expect(usagePercentage(500, 0)).toBe(0)
  })

  it('uses strict comparisons at the boundaries', () => {
    expect(classifyUsage(100, 90)).toBe('warning')
    expect(classifyUsage(100.01, 90)).toBe('exceeded')
    expect(classifyUsage(90, 90)).toBe('normal')
  })
})
