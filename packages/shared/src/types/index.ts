export type { MetricType, Labels, Metric, CollectorStatus, Snapshot } from './metrics.js';
export type { CollectorName, RaidState } from './collector.js';
export { COLLECTOR_NAMES, RAID_STATE_CODES } from './collector.js';
export type { LogLevel, ToolConfig, ExporterConfig } from './config.js';
