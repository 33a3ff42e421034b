import type { CollectorName } from './collector.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface ToolConfig {
  readonly enabled: boolean;
  readonly path: string;
}

export interface ExporterConfig {
  readonly address: string;
  readonly port: number;
  readonly metricsPath: string;
  readonly logLevel: LogLevel;
  readonly toolTimeoutMs: number;
  readonly collectorTimeoutMs: number;
  readonly killGraceMs: number;
  readonly maxOutputBytes: number;
  readonly selLimit: number;
  readonly collectors: Readonly<Record<CollectorName, ToolConfig>>;
}
