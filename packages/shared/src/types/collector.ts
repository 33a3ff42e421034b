export const COLLECTOR_NAMES = ['smartctl', 'megacli', 'perccli', 'ipmitool'] as const;

export type CollectorName = (typeof COLLECTOR_NAMES)[number];

export type RaidState = 'healthy' | 'degraded' | 'failed' | 'unknown';

export const RAID_STATE_CODES: Readonly<Record<RaidState, number>> = {
  healthy: 0,
  degraded: 1,
  failed: 2,
  unknown: 3,
};
