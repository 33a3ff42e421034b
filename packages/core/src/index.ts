// Tool invocation
export { ToolInvoker } from './invoker/ToolInvoker.js';
export type { ToolRunner, ToolResult, RunOptions, SpawnFn, ToolInvokerOptions } from './invoker/ToolInvoker.js';
export { gracefulShutdown } from './process/GracefulShutdown.js';

// Parsers
export { parseSmartctlScan, parseSmartctlDevice, smartctlExitIsFatal } from './parsers/smartctl.js';
export type { SmartDevice, SmartAttribute, SmartDeviceReport } from './parsers/smartctl.js';
export { parseStorcliShowAll } from './parsers/storcli.js';
export type { StorcliController, StorcliVirtualDrive, StorcliPhysicalDrive } from './parsers/storcli.js';
export { parseMegacliLdPdInfo, megacliRaidLevel } from './parsers/megacli.js';
export type { MegacliAdapter, MegacliVirtualDrive, MegacliPhysicalDrive } from './parsers/megacli.js';
export { parseIpmitoolSel } from './parsers/ipmitool.js';
export type { SelRecord } from './parsers/ipmitool.js';
export type { ParseOutcome } from './parsers/types.js';

// Collectors
export {
  CollectionContext,
  ToolCollector,
  SmartctlCollector,
  PercCliCollector,
  MegaCliCollector,
  IpmitoolSelCollector,
} from './collectors/index.js';
export type { Collector, CollectorDeps, CollectorResult } from './collectors/index.js';
export { CollectorRegistry, validateCollectorSelection } from './registry/CollectorRegistry.js';

// Snapshots and exposition
export { SnapshotBuilder } from './snapshot/SnapshotBuilder.js';
export type { SnapshotSource, SnapshotBuilderOptions } from './snapshot/SnapshotBuilder.js';
export { formatSnapshot, formatMetrics } from './exposition/format.js';
export { gauge, metricKey } from './metrics/metric.js';

// HTTP API
export { HTTPServer } from './api/HTTPServer.js';
export type { HTTPServerOptions } from './api/HTTPServer.js';

// Exporter
export { DiskExporter, createPipeline, createToolRunner } from './daemon/Exporter.js';
export type { CollectionPipeline, ExporterOptions } from './daemon/Exporter.js';
export { runExporter, reportStartupFailure } from './daemon/exporter-entry.js';
