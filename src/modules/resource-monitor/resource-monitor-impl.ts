/**
 * ResourceMonitorImpl: rate-limited sampler with limit classification.
 *
 * Samples are only replaced by newer ones: a reading whose clock value is
 * not strictly greater than the previous timestamp is discarded, so sample
 * timestamps are monotonically increasing. The memory high-watermark never
 * decreases.
 */

import type { ResourceName } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { ResourceLevel } from '../../core/event-bus.types.js'
import type {
  ResourceLevels,
  ResourceLimits,
  ResourceMonitor,
  ResourceMonitorOptions,
  ResourceSample,
  ResourceSampler,
  ResourceUsage,
} from './resource-monitor.js'
import { NodeResourceSampler } from './node-sampler.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('resource-monitor')

const DEFAULT_WARNING_THRESHOLD_PERCENT = 90
const DEFAULT_SAMPLE_INTERVAL_MS = 1_000

const USAGE_KEY: Record<ResourceName, keyof ResourceUsage & keyof ResourceLimits> = {
  memory: 'memoryBytes',
  cpu: 'cpuPercent',
  disk: 'diskBytes',
}

const RESOURCES: readonly ResourceName[] = ['memory', 'cpu', 'disk']

/** usage / limit × 100; a non-positive limit means unlimited */
export function usagePercentage(usage: number, limit: number): number {
  if (limit <= 0) return 0
  return (usage / limit) * 100
}

export function classifyUsage(percentage: number, warningThresholdPercent: number): ResourceLevel {
  if (percentage > 100) return 'exceeded'
  if (percentage > warningThresholdPercent) return 'warning'
  return 'normal'
}

export class ResourceMonitorImpl implements ResourceMonitor {
  private readonly _limits: ResourceLimits
  private readonly _warningThreshold: number
  private readonly _intervalMs: number
  private readonly _sampler: ResourceSampler
  private readonly _clock: () => number
  private readonly _eventBus: TypedEventBus | null

  private _sample: ResourceSample | null = null
  private _highWatermark = 0

  constructor(options: ResourceMonitorOptions, eventBus: TypedEventBus | null = null) {
    this._limits = { ...options.limits }
    this._warningThreshold = options.warningThresholdPercent ?? DEFAULT_WARNING_THRESHOLD_PERCENT
    this._intervalMs = options.sampleIntervalMs ?? DEFAULT_SAMPLE_INTERVAL_MS
    this._sampler = options.sampler ?? new NodeResourceSampler()
    this._clock = options.clock ?? Date.now
    this._eventBus = eventBus
  }

  update(): boolean {
    const now = this._clock()
    const previous = this._sample
    if (previous !== null) {
      if (now <= previous.timestamp) return false
      if (now - previous.timestamp < this._intervalMs) return false
    }

    const usage = this._sampler.sample()
    this._highWatermark = Math.max(this._highWatermark, usage.memoryBytes)
    this._sample = {
      timestamp: now,
      usage: { ...usage },
      limits: { ...this._limits },
      memoryHighWatermarkBytes: this._highWatermark,
    }
    logger.trace({ timestamp: now, usage }, 'Resource sample recorded')
    return true
  }

  checkLimits(): ResourceLevels {
    this.update()

    const levels: ResourceLevels = { memory: 'normal', cpu: 'normal', disk: 'normal' }
    for (const resource of RESOURCES) {
      const percentage = this._percentage(resource)
      const level = classifyUsage(percentage, this._warningThreshold)
      levels[resource] = level
      if (level === 'exceeded') {
        logger.warn({ resource, percentage }, 'Resource limit exceeded')
        this._eventBus?.emit('resource:exceeded', { resource, percentage })
      } else if (level === 'warning') {
        logger.debug({ resource, percentage }, 'Resource usage above warning threshold')
        this._eventBus?.emit('resource:warning', { resource, percentage })
      }
    }
    return levels
  }

  memoryPercentage(): number {
    return this._percentage('memory')
  }

  cpuPercentage(): number {
    return this._percentage('cpu')
  }

  diskPercentage(): number {
    return this._percentage('disk')
  }

  getSample(): Readonly<ResourceSample> | null {
    if (this._sample === null) return null
    return Object.freeze({
      ...this._sample,
      usage: Object.freeze({ ...this._sample.usage }),
      limits: Object.freeze({ ...this._sample.limits }),
    })
  }

  private _percentage(resource: ResourceName): number {
    if (this._sample === null) return 0
    const key = USAGE_KEY[resource]
    return usagePercentage(this._sample.usage[key], this._limits[key])
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createResourceMonitor(
  options: ResourceMonitorOptions,
  eventBus: TypedEventBus | null = null
): ResourceMonitor {
  return new ResourceMonitorImpl(options, eventBus)
}
