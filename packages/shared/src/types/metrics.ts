import type { CollectorName } from './collector.js';

export type MetricType = 'gauge' | 'counter';

export type Labels = Readonly<Record<string, string>>;

/**
 * One sample. Name plus label set identify it within a snapshot.
 */
export interface Metric {
  readonly name: string;
  readonly help: string;
  readonly type: MetricType;
  readonly labels: Labels;
  readonly value: number;
}

export interface CollectorStatus {
  readonly collector: CollectorName;
  readonly success: boolean;
  readonly durationMs: number;
  readonly issues: number;
  readonly error?: string;
}

/**
 * Result of one collection cycle. Built fresh for every scrape and frozen.
 */
export interface Snapshot {
  readonly createdAt: Date;
  readonly metrics: readonly Metric[];
  readonly collectors: readonly CollectorStatus[];
}
