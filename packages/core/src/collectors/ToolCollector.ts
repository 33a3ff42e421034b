import {
  CollectorError,
  getLogger,
  type CollectorName,
  type Labels,
  type Metric,
} from '@disk-exporter/shared';
import type { ToolResult } from '../invoker/ToolInvoker.js';
import { gauge } from '../metrics/metric.js';
import type { Collector, CollectorDeps, CollectorResult } from './types.js';

const logger = getLogger();

/**
 * State of a single `collect()` call. Nothing is shared between calls, so
 * overlapping scrapes never see each other's samples.
 */
export class CollectionContext {
  readonly metrics: Metric[] = [];
  readonly issues: string[] = [];

  gauge(name: string, help: string, labels: Labels, value: number): void {
    this.metrics.push(gauge(name, help, labels, value));
  }

  issue(message: string): void {
    this.issues.push(message);
  }
}

/**
 * Base for collectors backed by one vendor CLI. Subclasses implement
 * `gather()`; anything it throws becomes the result's CollectorError.
 */
export abstract class ToolCollector implements Collector {
  abstract readonly name: CollectorName;

  constructor(protected readonly deps: CollectorDeps) {}

  async collect(): Promise<CollectorResult> {
    const ctx = new CollectionContext();
    try {
      await this.gather(ctx);
      return { collector: this.name, metrics: ctx.metrics, issues: ctx.issues };
    } catch (err) {
      const error = err instanceof CollectorError ? err : new CollectorError(this.name, err);
      logger.warn({ collector: this.name, err: error }, 'Collector failed');
      return { collector: this.name, metrics: ctx.metrics, issues: ctx.issues, error };
    }
  }

  protected abstract gather(ctx: CollectionContext): Promise<void>;

  protected get command(): string {
    return this.deps.config.collectors[this.name].path;
  }

  protected invoke(args: readonly string[]): Promise<ToolResult> {
    return this.deps.runner.run(this.command, args, {
      timeoutMs: this.deps.config.toolTimeoutMs,
      maxOutputBytes: this.deps.config.maxOutputBytes,
    });
  }
}

export function describeExit(result: ToolResult): string {
  const detail = result.stderr.trim().split('\n')[0] ?? '';
  const status = result.exitCode === null ? `signal ${result.signal ?? 'unknown'}` : `exit code ${result.exitCode}`;
  return detail === '' ? `${result.command} ended with ${status}` : `${result.command} ended with ${status}: ${detail}`;
}
