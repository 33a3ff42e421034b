import { ParseError } from '@disk-exporter/shared';

/**
 * Parsed value plus a description of every record that had to be skipped.
 */
export interface ParseOutcome<T> {
  value: T;
  issues: string[];
}

export function parseJson(tool: string, text: string): unknown {
  if (text.trim() === '') {
    throw new ParseError(tool, 'empty output');
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ParseError(tool, err instanceof Error ? err.message : String(err), { cause: err });
  }
}

export function firstNumber(value: string, pattern: RegExp): number | undefined {
  const match = pattern.exec(value);
  if (!match?.[1]) return undefined;
  const parsed = Number.parseFloat(match[1]);
  return Number.isNaN(parsed) ? undefined : parsed;
}

const DATE = /^(\d{2})\/(\d{2})\/(\d{4})$/;
const TIME = /^(\d{2}):(\d{2}):(\d{2})$/;

/** `MM/DD/YYYY` and `HH:MM:SS`, read as UTC, to seconds since the epoch */
export function utcSeconds(date: string, time: string): number | undefined {
  const d = DATE.exec(date);
  const t = TIME.exec(time);
  if (!d || !t) return undefined;
  const [, month, day, year] = d.map(Number);
  const [, hours, minutes, seconds] = t.map(Number);
  if (
    month === undefined || day === undefined || year === undefined ||
    hours === undefined || minutes === undefined || seconds === undefined
  ) {
    return undefined;
  }
  if (month < 1 || month > 12 || day < 1 || day > 31 || hours > 23 || minutes > 59 || seconds > 59) {
    return undefined;
  }
  return Date.UTC(year, month - 1, day, hours, minutes, seconds) / 1000;
}
