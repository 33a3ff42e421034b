import type { Labels, Metric, Snapshot } from '@disk-exporter/shared';
import { sanitizeLabelName, sanitizeMetricName } from '../metrics/metric.js';

/**
 * Render a snapshot in the Prometheus text exposition format (0.0.4).
 */
export function formatSnapshot(snapshot: Snapshot): string {
  return formatMetrics(snapshot.metrics);
}

/**
 * Samples are grouped into families by name, in order of first appearance,
 * with one HELP and TYPE header per family.
 */
export function formatMetrics(metrics: readonly Metric[]): string {
  const families = new Map<string, Metric[]>();
  for (const metric of metrics) {
    const name = sanitizeMetricName(metric.name);
    const family = families.get(name);
    if (family) {
      family.push(metric);
    } else {
      families.set(name, [metric]);
    }
  }

  const lines: string[] = [];

  for (const [name, samples] of families) {
    const [first] = samples;
    if (!first) continue;

    lines.push(`# HELP ${name} ${escapeHelp(first.help)}`);
    lines.push(`# TYPE ${name} ${first.type}`);

    for (const sample of samples) {
      lines.push(`${name}${formatLabels(sample.labels)} ${formatValue(sample.value)}`);
    }

    lines.push('');
  }

  return lines.join('\n');
}

export function formatLabels(labels: Labels): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) return '';

  const parts = entries.map(([key, value]) => `${sanitizeLabelName(key)}="${escapeLabel(value)}"`);
  return `{${parts.join(',')}}`;
}

export function escapeLabel(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function escapeHelp(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n');
}

export function formatValue(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Number.POSITIVE_INFINITY) return '+Inf';
  if (value === Number.NEGATIVE_INFINITY) return '-Inf';
  return String(value);
}
