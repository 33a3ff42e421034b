import { describe, it, expect } from 'vitest';
import { parseDuration, formatDuration, parseBytes, parseBooleanFlag } from '../utils/parser.js';

describe('parseDuration', () => {
  it('should return the number directly when given a number', () => {
    expect(parseDuration(5000)).toBe(5000);
    expect(parseDuration(0)).toBe(0);
  });

  it('should treat bare digits as milliseconds', () => {
    expect(parseDuration('1500')).toBe(1500);
    expect(parseDuration(' 250 ')).toBe(250);
  });

  it('should parse unit suffixes', () => {
    expect(parseDuration('30s')).toBe(30000);
    expect(parseDuration('2m')).toBe(120000);
    expect(parseDuration('1h')).toBe(3600000);
    expect(parseDuration('100ms')).toBe(100);
  });

  it('should throw on invalid input', () => {
    expect(() => parseDuration('soon')).toThrow('Invalid duration string: "soon"');
    expect(() => parseDuration('')).toThrow('Invalid duration string: ""');
  });
});

describe('formatDuration', () => {
  it('should format each magnitude', () => {
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(30000)).toBe('30s');
    expect(formatDuration(120000)).toBe('2m');
    expect(formatDuration(7200000)).toBe('2h');
  });
});

describe('parseBytes', () => {
  it('should return numbers unchanged', () => {
    expect(parseBytes(1024)).toBe(1024);
  });

  it('should parse unit suffixes with 1024 multiples', () => {
    expect(parseBytes('16MB')).toBe(16 * 1024 * 1024);
    expect(parseBytes('512KB')).toBe(512 * 1024);
  });

  it('should throw on invalid input', () => {
    expect(() => parseBytes('lots')).toThrow('Invalid byte size string: "lots"');
  });
});

describe('parseBooleanFlag', () => {
  it('should accept truthy spellings', () => {
    for (const value of ['true', 'TRUE', '1', 'yes', 'on', ' On ']) {
      expect(parseBooleanFlag(value)).toBe(true);
    }
  });

  it('should accept falsy spellings', () => {
    for (const value of ['false', 'False', '0', 'no', 'off']) {
      expect(parseBooleanFlag(value)).toBe(false);
    }
  });

  it('should return undefined for anything else', () => {
    expect(parseBooleanFlag('maybe')).toBeUndefined();
    expect(parseBooleanFlag('')).toBeUndefined();
  });
});
