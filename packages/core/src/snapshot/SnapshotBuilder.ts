import {
  CollectorError,
  CollectorTimeoutError,
  EXPORTER_METRIC_PREFIX,
  getLogger,
  type CollectorStatus,
  type Metric,
  type Snapshot,
} from '@disk-exporter/shared';
import type { Collector, CollectorResult } from '../collectors/types.js';
import { gauge, metricKey } from '../metrics/metric.js';

const logger = getLogger();

export interface SnapshotSource {
  build(): Promise<Snapshot>;
}

export interface SnapshotBuilderOptions {
  /** Upper bound on a single collector's wall-clock time */
  collectorTimeoutMs: number;
  now?: () => Date;
}

export class SnapshotBuilder implements SnapshotSource {
  private readonly now: () => Date;

  constructor(
    private readonly collectors: readonly Collector[],
    private readonly options: SnapshotBuilderOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async build(): Promise<Snapshot> {
    const results = await Promise.all(this.collectors.map((collector) => this.runCollector(collector)));

    const metrics: Metric[] = [];
    const statuses: CollectorStatus[] = [];
    const seen = new Set<string>();

    const add = (metric: Metric, collector: string) => {
      const key = metricKey(metric);
      if (seen.has(key)) {
        logger.warn({ collector, metric: key }, 'Dropping duplicate sample');
        return;
      }
      seen.add(key);
      metrics.push(Object.freeze({ ...metric, labels: Object.freeze({ ...metric.labels }) }));
    };

    for (const { result, durationMs } of results) {
      for (const metric of result.metrics) {
        add(metric, result.collector);
      }

      const status: CollectorStatus = {
        collector: result.collector,
        success: result.error === undefined,
        durationMs,
        issues: result.issues.length,
        ...(result.error ? { error: result.error.message } : {}),
      };
      statuses.push(Object.freeze(status));

      if (result.issues.length > 0) {
        logger.debug({ collector: result.collector, issues: result.issues }, 'Collector skipped items');
      }

      const labels = { collector: result.collector };
      add(
        gauge(`${EXPORTER_METRIC_PREFIX}collector_success`, 'Whether the collector reported successfully (1 = yes)', labels, status.success ? 1 : 0),
        result.collector,
      );
      add(
        gauge(`${EXPORTER_METRIC_PREFIX}collector_duration_seconds`, 'Time the collector took', labels, durationMs / 1000),
        result.collector,
      );
      add(
        gauge(`${EXPORTER_METRIC_PREFIX}collector_issues`, 'Items the collector skipped as unreadable', labels, result.issues.length),
        result.collector,
      );
    }

    const createdAt = this.now();
    add(
      gauge(`${EXPORTER_METRIC_PREFIX}last_update_time_seconds`, 'Time the snapshot was taken', {}, createdAt.getTime() / 1000),
      'exporter',
    );

    return Object.freeze({
      createdAt,
      metrics: Object.freeze(metrics),
      collectors: Object.freeze(statuses),
    });
  }

  /**
   * Races the collector against the budget. The collector keeps running past
   * a timeout; its tool process is reaped by the invoker.
   */
  private async runCollector(collector: Collector): Promise<{ result: CollectorResult; durationMs: number }> {
    const start = Date.now();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<CollectorResult>((resolve) => {
      timer = setTimeout(() => {
        const error = new CollectorTimeoutError(collector.name, this.options.collectorTimeoutMs);
        logger.warn({ collector: collector.name, budgetMs: this.options.collectorTimeoutMs }, 'Collector timed out');
        resolve({ collector: collector.name, metrics: [], issues: [], error });
      }, this.options.collectorTimeoutMs);
    });

    try {
      const result = await Promise.race([safeCollect(collector), timeout]);
      return { result, durationMs: Date.now() - start };
    } finally {
      clearTimeout(timer);
    }
  }
}

async function safeCollect(collector: Collector): Promise<CollectorResult> {
  try {
    return await collector.collect();
  } catch (err) {
    return { collector: collector.name, metrics: [], issues: [], error: new CollectorError(collector.name, err) };
  }
}
