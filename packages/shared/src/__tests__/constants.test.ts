import { describe, it, expect } from 'vitest';
import {
  DEFAULT_PORT,
  DEFAULT_METRICS_PATH,
  DEFAULT_MEGACLI_PATH,
  DEFAULT_PERCCLI_PATH,
  EXPOSITION_CONTENT_TYPE,
  EXPORTER_VERSION,
} from '../constants.js';
import { COLLECTOR_NAMES, RAID_STATE_CODES } from '../types/collector.js';

describe('constants', () => {
  it('should listen on 8101 by default', () => {
    expect(DEFAULT_PORT).toBe(8101);
  });

  it('should serve on /metrics by default', () => {
    expect(DEFAULT_METRICS_PATH).toBe('/metrics');
  });

  it('should point at the vendor tool install locations', () => {
    expect(DEFAULT_MEGACLI_PATH).toBe('/opt/MegaRAID/MegaCli/MegaCli64');
    expect(DEFAULT_PERCCLI_PATH).toBe('/usr/bin/perccli64');
  });

  it('should use the 0.0.4 text exposition content type', () => {
    expect(EXPOSITION_CONTENT_TYPE).toBe('text/plain; version=0.0.4; charset=utf-8');
  });

  it('should have a semver version', () => {
    expect(EXPORTER_VERSION).toMatch(/^\d+\.\d+\.\d+$/);
  });
});

describe('collector constants', () => {
  it('should list the four collectors', () => {
    expect(COLLECTOR_NAMES).toEqual(['smartctl', 'megacli', 'perccli', 'ipmitool']);
  });

  it('should map RAID states to numeric codes', () => {
    expect(RAID_STATE_CODES).toEqual({ healthy: 0, degraded: 1, failed: 2, unknown: 3 });
  });
});
