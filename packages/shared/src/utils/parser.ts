import msLib from 'ms';
import bytesLib from 'bytes';

/**
 * Parse a duration string to milliseconds.
 * Supports: '30s', '5m', '1h', '100ms', bare digits as milliseconds.
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') return value;
  if (/^\d+$/.test(value.trim())) return Number(value.trim());

  const result = value.trim() === '' ? undefined : msLib(value);
  if (result === undefined || Number.isNaN(result)) {
    throw new Error(`Invalid duration string: "${value}"`);
  }
  return result;
}

/**
 * Format milliseconds to a human-readable duration string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${Math.round(ms / 1000)}s`;
  if (ms < 3_600_000) return `${Math.round(ms / 60_000)}m`;
  return `${Math.round(ms / 3_600_000)}h`;
}

/**
 * Parse a byte size string to number of bytes.
 * Supports: '512KB', '16MB', '1GB', bare digits as bytes.
 */
export function parseBytes(value: string | number): number {
  if (typeof value === 'number') return value;

  const result = bytesLib.parse(value);
  if (result === null || Number.isNaN(result)) {
    throw new Error(`Invalid byte size string: "${value}"`);
  }
  return result;
}

/**
 * Parse a boolean toggle as found in environment variables.
 * Returns undefined for anything that is not a recognised spelling.
 */
export function parseBooleanFlag(value: string): boolean | undefined {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
    case 'on':
      return true;
    case 'false':
    case '0':
    case 'no':
    case 'off':
      return false;
    default:
      return undefined;
  }
}
