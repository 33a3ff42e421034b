import { ParseError } from '@disk-exporter/shared';
import { firstNumber, type ParseOutcome } from './types.js';

const TOOL = 'megacli';

export interface MegacliPhysicalDrive {
  enclosure: string;
  slot: string;
  deviceId: string;
  state: string;
  mediaErrors?: number;
  otherErrors?: number;
  predictiveFailures?: number;
  temperatureCelsius?: number;
  smartAlert?: boolean;
}

export interface MegacliVirtualDrive {
  id: string;
  targetId: string;
  name: string;
  raidLevel: string;
  state: string;
  physicalDrives: MegacliPhysicalDrive[];
}

export interface MegacliAdapter {
  index: number;
  virtualDrives: MegacliVirtualDrive[];
}

const ADAPTER_LINE = /^Adapter\s*#\s*(\d+)/;
const VIRTUAL_DRIVE_LINE = /^Virtual Drive:\s*(\d+)\s*\(Target Id:\s*(\d+)\)/;
const PHYSICAL_DRIVE_LINE = /^PD:\s*\d+\s+Information/;

/**
 * "Primary-1, Secondary-0, RAID Level Qualifier-0" becomes RAID1, and a
 * secondary level of 3 marks a spanned array (RAID10, RAID50, RAID60).
 */
export function megacliRaidLevel(value: string): string {
  const primary = /Primary-(\d+)/.exec(value)?.[1];
  if (primary === undefined) return value.trim();
  const secondary = /Secondary-(\d+)/.exec(value)?.[1];
  return secondary === '3' ? `RAID${primary}0` : `RAID${primary}`;
}

/**
 * Parse the text report of `MegaCli64 -LdPdInfo -aALL -NoLog`.
 */
export function parseMegacliLdPdInfo(output: string): ParseOutcome<MegacliAdapter[]> {
  const issues: string[] = [];
  const adapters: MegacliAdapter[] = [];

  let adapter: MegacliAdapter | undefined;
  let virtualDrive: MegacliVirtualDrive | undefined;
  let drive: MegacliPhysicalDrive | undefined;
  let seen = new Set<string>();

  const finishDrive = (): void => {
    if (!drive || !virtualDrive || !adapter) {
      drive = undefined;
      return;
    }
    if (drive.slot === '') {
      issues.push(`adapter ${adapter.index}: physical drive without a slot number skipped`);
    } else {
      // A drive spanning several virtual drives is listed under each of them
      const key = `${drive.enclosure}:${drive.slot}`;
      if (!seen.has(key)) {
        seen.add(key);
        virtualDrive.physicalDrives.push(drive);
      }
    }
    drive = undefined;
  };

  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '') continue;

    const adapterMatch = ADAPTER_LINE.exec(line);
    if (adapterMatch?.[1]) {
      finishDrive();
      adapter = { index: Number(adapterMatch[1]), virtualDrives: [] };
      adapters.push(adapter);
      virtualDrive = undefined;
      seen = new Set<string>();
      continue;
    }

    const virtualMatch = VIRTUAL_DRIVE_LINE.exec(line);
    if (virtualMatch?.[1] && virtualMatch[2]) {
      finishDrive();
      if (!adapter) {
        issues.push(`virtual drive ${virtualMatch[1]} reported outside an adapter block`);
        virtualDrive = undefined;
        continue;
      }
      virtualDrive = {
        id: virtualMatch[1],
        targetId: virtualMatch[2],
        name: '',
        raidLevel: '',
        state: '',
        physicalDrives: [],
      };
      adapter.virtualDrives.push(virtualDrive);
      continue;
    }

    if (PHYSICAL_DRIVE_LINE.test(line)) {
      finishDrive();
      if (virtualDrive) {
        drive = { enclosure: '', slot: '', deviceId: '', state: '' };
      }
      continue;
    }

    const separator = line.indexOf(':');
    if (separator === -1) continue;
    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();

    if (drive) {
      applyDriveField(drive, key, value, line);
    } else if (virtualDrive) {
      applyVirtualDriveField(virtualDrive, key, value);
    }
  }
  finishDrive();

  if (adapters.length === 0) {
    throw new ParseError(TOOL, 'no adapters reported');
  }

  return { value: adapters, issues };
}

function applyVirtualDriveField(vd: MegacliVirtualDrive, key: string, value: string): void {
  switch (key) {
    case 'Name':
      vd.name = value;
      break;
    case 'RAID Level':
      vd.raidLevel = megacliRaidLevel(value);
      break;
    case 'State':
      vd.state = value;
      break;
  }
}

function applyDriveField(drive: MegacliPhysicalDrive, key: string, value: string, line: string): void {
  if (line.startsWith('Drive has flagged a S.M.A.R.T alert')) {
    drive.smartAlert = value === 'Yes';
    return;
  }
  switch (key) {
    case 'Enclosure Device ID':
      drive.enclosure = value === 'N/A' ? '' : value;
      break;
    case 'Slot Number':
      drive.slot = value;
      break;
    case 'Device Id':
      drive.deviceId = value;
      break;
    case 'Media Error Count':
      drive.mediaErrors = firstNumber(value, /^(\d+)/);
      break;
    case 'Other Error Count':
      drive.otherErrors = firstNumber(value, /^(\d+)/);
      break;
    case 'Predictive Failure Count':
      drive.predictiveFailures = firstNumber(value, /^(\d+)/);
      break;
    case 'Firmware state':
      drive.state = (value.split(',')[0] ?? '').trim();
      break;
    case 'Drive Temperature':
      drive.temperatureCelsius = firstNumber(value, /^(-?\d+(?:\.\d+)?)\s*C/);
      break;
  }
}
