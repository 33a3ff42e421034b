import type { Labels, Metric } from '@disk-exporter/shared';

const INVALID_NAME_CHARS = /[^a-zA-Z0-9_:]/g;
const INVALID_LABEL_CHARS = /[^a-zA-Z0-9_]/g;

export function sanitizeMetricName(name: string): string {
  const cleaned = name.replace(INVALID_NAME_CHARS, '_');
  return /^[a-zA-Z_:]/.test(cleaned) ? cleaned : `_${cleaned}`;
}

export function sanitizeLabelName(name: string): string {
  const cleaned = name.replace(INVALID_LABEL_CHARS, '_');
  return /^[a-zA-Z_]/.test(cleaned) ? cleaned : `_${cleaned}`;
}

/**
 * 'Reallocated_Sector_Ct' -> 'reallocated_sector_ct',
 * 'Power-Off_Retract_Count' -> 'power_off_retract_count'
 */
export function toSnakeCase(value: string): string {
  return value
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[^a-zA-Z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase();
}

export function gauge(name: string, help: string, labels: Labels, value: number): Metric {
  const cleanLabels: Record<string, string> = {};
  for (const [key, labelValue] of Object.entries(labels)) {
    cleanLabels[sanitizeLabelName(key)] = labelValue;
  }
  return {
    name: sanitizeMetricName(name),
    help,
    type: 'gauge',
    labels: cleanLabels,
    value,
  };
}

/**
 * Identity of a sample within a snapshot: name plus label set, label order ignored.
 */
export function metricKey(metric: Metric): string {
  const labels = Object.keys(metric.labels)
    .sort()
    .map((key) => `${key}=${JSON.stringify(metric.labels[key])}`)
    .join(',');
  return `${metric.name}{${labels}}`;
}
