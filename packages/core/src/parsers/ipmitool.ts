import { utcSeconds, type ParseOutcome } from './types.js';

export interface SelRecord {
  id: number;
  /** Seconds since the epoch, read as UTC */
  timestamp: number;
  sensor: string;
  sensorType: string;
  event: string;
  direction: string;
}

/**
 * Parse `ipmitool sel list`. Lines look like
 * `   1 | 03/15/2024 | 10:22:01 | Power Supply #0x51 | Failure detected | Asserted`;
 * the direction column is absent on some BMCs.
 */
export function parseIpmitoolSel(output: string): ParseOutcome<SelRecord[]> {
  const records: SelRecord[] = [];
  const issues: string[] = [];

  output.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line === '' || /^SEL has no entries/i.test(line)) return;

    const fields = line.split('|').map((field) => field.trim());
    if (fields.length !== 5 && fields.length !== 6) {
      issues.push(`line ${index + 1}: expected 5 or 6 fields, got ${fields.length}`);
      return;
    }

    const [idField = '', date = '', time = '', sensor = '', event = '', direction = ''] = fields;
    const id = /^[0-9a-f]+$/i.test(idField) ? Number.parseInt(idField, 16) : Number.NaN;
    if (Number.isNaN(id)) {
      issues.push(`line ${index + 1}: invalid record id "${idField}"`);
      return;
    }

    const timestamp = utcSeconds(date, time);
    if (timestamp === undefined) {
      issues.push(`line ${index + 1}: invalid timestamp "${date} ${time}"`);
      return;
    }

    records.push({
      id,
      timestamp,
      sensor,
      sensorType: sensor.replace(/\s*#0x[0-9a-f]+$/i, ''),
      event,
      direction,
    });
  });

  return { value: records, issues };
}
