export type {
  ResourceMonitor,
  ResourceMonitorOptions,
  ResourceSample,
  ResourceSampler,
  ResourceUsage,
  ResourceLimits,
  ResourceLevels,
} from './resource-monitor.js'
export {
  ResourceMonitorImpl,
  createResourceMonitor,
  usagePercentage,
  classifyUsage,
} from './resource-monitor-impl.js'
export { NodeResourceSampler } from './node-sampler.js'
