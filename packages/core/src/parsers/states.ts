import { RAID_STATE_CODES, type RaidState } from '@disk-exporter/shared';

const PERC_VIRTUAL_DRIVE: Record<string, RaidState> = {
  Optl: 'healthy',
  Dgrd: 'degraded',
  Pdgd: 'degraded',
  Rec: 'degraded',
  OfLn: 'failed',
};

const PERC_PHYSICAL_DRIVE: Record<string, RaidState> = {
  Onln: 'healthy',
  UGood: 'healthy',
  GHS: 'healthy',
  DHS: 'healthy',
  JBOD: 'healthy',
  Rbld: 'degraded',
  Cpybck: 'degraded',
  Offln: 'failed',
  UBad: 'failed',
  F: 'failed',
  Msng: 'failed',
};

const PERC_CONTROLLER: Record<string, RaidState> = {
  optimal: 'healthy',
  ok: 'healthy',
  degraded: 'degraded',
  'partially degraded': 'degraded',
  failed: 'failed',
};

const MEGA_VIRTUAL_DRIVE: Record<string, RaidState> = {
  optimal: 'healthy',
  degraded: 'degraded',
  'partially degraded': 'degraded',
  offline: 'failed',
};

const MEGA_PHYSICAL_DRIVE: Record<string, RaidState> = {
  online: 'healthy',
  hotspare: 'healthy',
  'unconfigured(good)': 'healthy',
  jbod: 'healthy',
  rebuild: 'degraded',
  copyback: 'degraded',
  failed: 'failed',
  offline: 'failed',
  'unconfigured(bad)': 'failed',
  missing: 'failed',
};

function lookup(table: Record<string, RaidState>, value: string): RaidState {
  return Object.hasOwn(table, value) ? (table[value] ?? 'unknown') : 'unknown';
}

export function percVirtualDriveState(state: string): RaidState {
  return lookup(PERC_VIRTUAL_DRIVE, state.trim());
}

export function percPhysicalDriveState(state: string): RaidState {
  return lookup(PERC_PHYSICAL_DRIVE, state.trim());
}

export function percControllerState(status: string): RaidState {
  return lookup(PERC_CONTROLLER, status.trim().toLowerCase());
}

export function megaVirtualDriveState(state: string): RaidState {
  // "Partially Degraded" and "Degraded" may carry a trailing qualifier
  const normalized = state.trim().toLowerCase();
  if (normalized.startsWith('partially degraded')) return 'degraded';
  return lookup(MEGA_VIRTUAL_DRIVE, normalized);
}

export function megaPhysicalDriveState(state: string): RaidState {
  return lookup(MEGA_PHYSICAL_DRIVE, state.trim().toLowerCase().replace(/\s+/g, ''));
}

export function raidStateCode(state: RaidState): number {
  return RAID_STATE_CODES[state];
}
