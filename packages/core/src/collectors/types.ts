import type { CollectorError, CollectorName, ExporterConfig, Metric } from '@disk-exporter/shared';
import type { ToolRunner } from '../invoker/ToolInvoker.js';

export interface CollectorResult {
  collector: CollectorName;
  metrics: Metric[];
  /** Items that were skipped; the rest of the output was used */
  issues: string[];
  /** Set when the collector as a whole could not report */
  error?: CollectorError;
}

/**
 * One hardware subsystem. `collect()` resolves for every outcome.
 */
export interface Collector {
  readonly name: CollectorName;
  collect(): Promise<CollectorResult>;
}

export interface CollectorDeps {
  config: ExporterConfig;
  runner: ToolRunner;
}
