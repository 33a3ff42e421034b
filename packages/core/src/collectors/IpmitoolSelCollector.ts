import { parseIpmitoolSel, type SelRecord } from '../parsers/ipmitool.js';
import { CollectionContext, ToolCollector, describeExit } from './ToolCollector.js';

const SEL_LIST_ARGS = ['sel', 'list'] as const;

export class IpmitoolSelCollector extends ToolCollector {
  readonly name = 'ipmitool' as const;

  protected async gather(ctx: CollectionContext): Promise<void> {
    const result = await this.invoke(SEL_LIST_ARGS);
    ctx.gauge('ipmitool_exit_code', 'Exit code of ipmitool sel list', {}, result.exitCode ?? -1);
    if (result.exitCode !== 0) {
      throw new Error(describeExit(result));
    }

    const { value: records, issues } = parseIpmitoolSel(result.stdout);
    issues.forEach((issue) => ctx.issue(issue));

    for (const record of latest(records, this.deps.config.selLimit)) {
      ctx.gauge(
        'ipmitool_sel_event',
        'BMC system event log entry',
        {
          id: String(record.id),
          timestamp: String(record.timestamp),
          sensor: record.sensor,
          event: record.event,
          direction: record.direction,
        },
        1,
      );
    }

    const bySensorType = new Map<string, number>();
    for (const record of records) {
      bySensorType.set(record.sensorType, (bySensorType.get(record.sensorType) ?? 0) + 1);
    }
    for (const [sensorType, count] of bySensorType) {
      ctx.gauge('ipmitool_sel_entries', 'BMC system event log entries by sensor type', { sensor_type: sensorType }, count);
    }

    if (records.length > 0) {
      const newest = records.reduce((max, record) => Math.max(max, record.timestamp), 0);
      ctx.gauge('ipmitool_sel_latest_timestamp_seconds', 'Time of the most recent SEL entry', {}, newest);
    }
  }
}

/**
 * The `limit` most recent records, newest last. Record ids break timestamp ties.
 */
export function latest(records: readonly SelRecord[], limit: number): SelRecord[] {
  if (limit <= 0) return [];
  const sorted = [...records].sort((a, b) => a.timestamp - b.timestamp || a.id - b.id);
  return sorted.slice(-limit);
}
