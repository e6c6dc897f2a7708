/**
 * ResourceMonitor interface: public contract for resource sampling.
 *
 * One monitor is created per orchestration run and injected into the
 * scheduler and the adaptive chunker; there is no process-wide instance.
 */

import type { ResourceName } from '../../core/errors.js'
import type { ResourceLevel } from '../../core/event-bus.types.js'

// ---------------------------------------------------------------------------
// Samples and limits
// ---------------------------------------------------------------------------

/** Raw usage reading returned by a sampler */
export interface ResourceUsage {
  memoryBytes: number
  /** CPU busy time as a percentage of total machine capacity (0-100) */
  cpuPercent: number
  diskBytes: number
}

export interface ResourceLimits {
  memoryBytes: number
  cpuPercent: number
  diskBytes: number
}

/** Timestamped usage plus the configured limits */
export interface ResourceSample {
  timestamp: number
  usage: ResourceUsage
  limits: ResourceLimits
  /** Highest memory usage ever sampled by this monitor */
  memoryHighWatermarkBytes: number
}

export type ResourceLevels = Record<ResourceName, ResourceLevel>

/** Source of raw usage readings; the default reads from the Node process */
export interface ResourceSampler {
  sample(): ResourceUsage
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ResourceMonitorOptions {
  limits: ResourceLimits
  /** Usage above this percentage of a limit reports `warning` (default 90) */
  warningThresholdPercent?: number
  /** Minimum milliseconds between two samples (default 1000) */
  sampleIntervalMs?: number
  sampler?: ResourceSampler
  /** Millisecond clock, injectable for tests (default Date.now) */
  clock?: () => number
}

// ---------------------------------------------------------------------------
// ResourceMonitor interface
// ---------------------------------------------------------------------------

export interface ResourceMonitor {
  /**
   * Take a new sample unless the sample interval has not elapsed since the
   * previous one.
   * @returns true if a new sample was recorded
   */
  update(): boolean

  /** update(), then classify each resource against its limit */
  checkLimits(): ResourceLevels

  /** Current memory usage as a percentage of its limit */
  memoryPercentage(): number

  cpuPercentage(): number

  diskPercentage(): number

  /** Frozen copy of the latest sample, or null before the first update */
  getSample(): Readonly<ResourceSample> | null
}
