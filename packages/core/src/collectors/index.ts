export type { Collector, CollectorDeps, CollectorResult } from './types.js';
export { CollectionContext, ToolCollector } from './ToolCollector.js';
export { SmartctlCollector } from './SmartctlCollector.js';
export { PercCliCollector } from './PercCliCollector.js';
export { MegaCliCollector } from './MegaCliCollector.js';
export { IpmitoolSelCollector } from './IpmitoolSelCollector.js';
