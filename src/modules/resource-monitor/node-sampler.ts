/**
 * Default ResourceSampler backed by the running Node.js process.
 *
 *  - memory: resident set size of this process
 *  - cpu: process CPU time since the previous reading, relative to wall
 *    time across all cores
 *  - disk: bytes used on the filesystem holding `diskPath`
 */

import { statfsSync } from 'node:fs'
import { availableParallelism } from 'node:os'
import type { ResourceSampler, ResourceUsage } from './resource-monitor.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('resource-monitor:sampler')

export class NodeResourceSampler implements ResourceSampler {
  private readonly _diskPath: string
  private readonly _cores: number
  private _lastCpu: NodeJS.CpuUsage
  private _lastWall: bigint

  constructor(diskPath = '.') {
    this._diskPath = diskPath
    this._cores = Math.max(1, availableParallelism())
    this._lastCpu = process.cpuUsage()
    this._lastWall = process.hrtime.bigint()
  }

  sample(): ResourceUsage {
    return {
      memoryBytes: process.memoryUsage().rss,
      cpuPercent: this._sampleCpu(),
      diskBytes: this._sampleDisk(),
    }
  }

  private _sampleCpu(): number {
    const cpu = process.cpuUsage(this._lastCpu)
    const wall = process.hrtime.bigint()
    const elapsedMicros = Number(wall - this._lastWall) / 1000
    this._lastCpu = process.cpuUsage()
    this._lastWall = wall
    if (elapsedMicros <= 0) return 0
    const busyMicros = cpu.user + cpu.system
    return Math.min(100, (busyMicros / (elapsedMicros * this._cores)) * 100)
  }

  private _sampleDisk(): number {
    try {
      const stats = statfsSync(this._diskPath)
      return (stats.blocks - stats.bfree) * stats.bsize
    } catch (err) {
      logger.warn({ err, path: this._diskPath }, 'Disk usage unavailable; reporting 0')
      return 0
    }
  }
}
