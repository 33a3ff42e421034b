import { z } from 'zod';
import { ParseError } from '@disk-exporter/shared';
import { firstNumber, parseJson, utcSeconds, type ParseOutcome } from './types.js';

const TOOL = 'perccli';

export interface StorcliVirtualDrive {
  driveGroup: string;
  virtualDrive: string;
  name: string;
  raidType: string;
  state: string;
}

export interface StorcliPhysicalDrive {
  enclosure: string;
  slot: string;
  deviceId: string;
  driveGroup: string;
  state: string;
  model: string;
  media: string;
  interface: string;
  mediaErrors?: number;
  otherErrors?: number;
  predictiveFailures?: number;
  temperatureCelsius?: number;
  smartAlert?: boolean;
}

export interface StorcliController {
  index: number;
  model: string;
  serial: string;
  firmware: string;
  biosVersion: string;
  driver: string;
  status: string;
  rocTemperatureCelsius?: number;
  bbuStatus?: number;
  memoryCorrectableErrors?: number;
  memoryUncorrectableErrors?: number;
  backendPorts?: number;
  driveGroups?: number;
  virtualDriveCount?: number;
  physicalDriveCount?: number;
  patrolReadScheduled?: boolean;
  /** Absolute gap between the controller clock and the host clock */
  clockSkewSeconds?: number;
  onboardMemoryBytes?: number;
  writeCacheBytes?: number;
  virtualDrives: StorcliVirtualDrive[];
  physicalDrives: StorcliPhysicalDrive[];
  cachevaultTemperatures: number[];
}

const text = z.union([z.string(), z.number()]).transform((value) => String(value).trim());

const rootSchema = z.object({
  Controllers: z.array(z.unknown()).min(1),
});

const controllerSchema = z.object({
  'Command Status': z.object({
    Status: z.string(),
    Description: z.string().optional(),
  }),
  'Response Data': z.record(z.unknown()).optional(),
});

const responseSchema = z.object({
  Basics: z.object({
    Controller: z.number().int(),
    Model: text.optional(),
    'Serial Number': text.optional(),
    'Current Controller Date/Time': z.string().optional(),
    'Current System Date/time': z.string().optional(),
  }),
  Version: z
    .object({
      'Firmware Version': text.optional(),
      'Bios Version': text.optional(),
      'Driver Name': text.optional(),
    })
    .optional(),
  Status: z
    .object({
      'Controller Status': z.string().optional(),
      'BBU Status': z.union([z.number(), z.string()]).optional(),
      'Memory Correctable Errors': z.number().optional(),
      'Memory Uncorrectable Errors': z.number().optional(),
    })
    .optional(),
  HwCfg: z.record(z.unknown()).optional(),
  'Scheduled Tasks': z.record(z.unknown()).optional(),
  'Drive Groups': z.number().int().optional(),
  'Virtual Drives': z.number().int().optional(),
  'Physical Drives': z.number().int().optional(),
  'VD LIST': z.array(z.unknown()).optional(),
  'PD LIST': z.array(z.unknown()).optional(),
  'Physical Device Information': z.record(z.unknown()).optional(),
  Cachevault_Info: z.array(z.unknown()).optional(),
});

const virtualDriveSchema = z.object({
  'DG/VD': z.string().regex(/^\d+\/\d+$/),
  TYPE: text.optional(),
  State: z.string().min(1),
  Name: text.optional(),
});

const physicalDriveSchema = z.object({
  'EID:Slt': z.string().regex(/^[^:]*:\d+$/),
  DID: text,
  State: z.string().min(1),
  DG: text.optional(),
  Intf: text.optional(),
  Med: text.optional(),
  Model: text.optional(),
});

const driveStateSchema = z.object({
  'Media Error Count': z.number().optional(),
  'Other Error Count': z.number().optional(),
  'Predictive Failure Count': z.number().optional(),
  'Drive Temperature': z.string().optional(),
  'S.M.A.R.T alert flagged by drive': z.string().optional(),
});

const cachevaultSchema = z.object({
  Temp: z.string(),
});

/**
 * Parse `perccli64 /call show all J`. Both the MegaRAID (megaraid_sas) and the
 * HBA (mpt3sas) response layouts are understood.
 */
export function parseStorcliShowAll(output: string): ParseOutcome<StorcliController[]> {
  const root = rootSchema.safeParse(parseJson(TOOL, output));
  if (!root.success) {
    throw new ParseError(TOOL, 'output has no "Controllers" array');
  }

  const issues: string[] = [];
  const failures: string[] = [];
  const controllers: StorcliController[] = [];

  root.data.Controllers.forEach((entry, position) => {
    const controller = controllerSchema.safeParse(entry);
    if (!controller.success) {
      issues.push(`controller entry ${position}: missing "Command Status"`);
      return;
    }

    const status = controller.data['Command Status'];
    if (status.Status !== 'Success') {
      failures.push(`controller entry ${position}: ${status.Description ?? status.Status}`);
      return;
    }

    const response = responseSchema.safeParse(controller.data['Response Data']);
    if (!response.success) {
      issues.push(`controller entry ${position}: ${response.error.issues[0]?.message ?? 'invalid response'}`);
      return;
    }

    controllers.push(buildController(response.data, issues));
  });

  if (controllers.length === 0) {
    const reasons = [...failures, ...issues];
    throw new ParseError(TOOL, reasons.length > 0 ? reasons.join('; ') : 'no controllers reported');
  }

  return { value: controllers, issues: [...failures, ...issues] };
}

function buildController(
  response: z.infer<typeof responseSchema>,
  issues: string[],
): StorcliController {
  const index = response.Basics.Controller;
  const hwCfg = response.HwCfg ?? {};

  const controller: StorcliController = {
    index,
    model: response.Basics.Model ?? '',
    serial: response.Basics['Serial Number'] ?? '',
    firmware: response.Version?.['Firmware Version'] ?? '',
    biosVersion: response.Version?.['Bios Version'] ?? '',
    driver: response.Version?.['Driver Name'] ?? '',
    status: response.Status?.['Controller Status'] ?? '',
    rocTemperatureCelsius: rocTemperature(hwCfg),
    bbuStatus: toNumber(response.Status?.['BBU Status']),
    memoryCorrectableErrors: response.Status?.['Memory Correctable Errors'],
    memoryUncorrectableErrors: response.Status?.['Memory Uncorrectable Errors'],
    backendPorts: toNumber(hwCfg['Backend Port Count']),
    driveGroups: response['Drive Groups'],
    virtualDriveCount: response['Virtual Drives'],
    patrolReadScheduled: patrolRead(response['Scheduled Tasks']),
    clockSkewSeconds: clockSkew(
      response.Basics['Current Controller Date/Time'],
      response.Basics['Current System Date/time'],
    ),
    onboardMemoryBytes: megabytes(hwCfg['On Board Memory Size']),
    writeCacheBytes: megabytes(hwCfg['Current Size of FW Cache (MB)']),
    virtualDrives: [],
    physicalDrives: [],
    cachevaultTemperatures: [],
  };

  const seenVirtual = new Set<string>();
  for (const entry of response['VD LIST'] ?? []) {
    const vd = virtualDriveSchema.safeParse(entry);
    if (!vd.success) {
      issues.push(`controller ${index}: virtual drive skipped (${vd.error.issues[0]?.message ?? 'invalid'})`);
      continue;
    }
    const [driveGroup = '', virtualDrive = ''] = vd.data['DG/VD'].split('/');
    if (seenVirtual.has(vd.data['DG/VD'])) continue;
    seenVirtual.add(vd.data['DG/VD']);
    controller.virtualDrives.push({
      driveGroup,
      virtualDrive,
      name: vd.data.Name ?? '',
      raidType: vd.data.TYPE ?? '',
      state: vd.data.State.trim(),
    });
  }

  const deviceInfo = response['Physical Device Information'] ?? {};
  const listed = response['PD LIST'] ?? basicDriveEntries(deviceInfo);
  controller.physicalDriveCount = response['Physical Drives'] ?? (response['PD LIST'] ? undefined : listed.length);
  const seenPhysical = new Set<string>();

  for (const entry of listed) {
    const pd = physicalDriveSchema.safeParse(entry);
    if (!pd.success) {
      issues.push(`controller ${index}: physical drive skipped (${pd.error.issues[0]?.message ?? 'invalid'})`);
      continue;
    }
    const [enclosure = '', slot = ''] = pd.data['EID:Slt'].split(':').map((part) => part.trim());
    const key = `${enclosure}:${slot}`;
    if (seenPhysical.has(key)) continue;
    seenPhysical.add(key);

    const drive: StorcliPhysicalDrive = {
      enclosure,
      slot,
      deviceId: pd.data.DID,
      driveGroup: pd.data.DG ?? '',
      state: pd.data.State.trim(),
      model: pd.data.Model ?? '',
      media: pd.data.Med ?? '',
      interface: pd.data.Intf ?? '',
    };

    const details = driveState(deviceInfo, index, enclosure, slot);
    if (details) {
      drive.mediaErrors = details['Media Error Count'];
      drive.otherErrors = details['Other Error Count'];
      drive.predictiveFailures = details['Predictive Failure Count'];
      drive.temperatureCelsius = details['Drive Temperature']
        ? firstNumber(details['Drive Temperature'], /(-?\d+(?:\.\d+)?)\s*C/)
        : undefined;
      const alert = details['S.M.A.R.T alert flagged by drive'];
      drive.smartAlert = alert === undefined ? undefined : alert.trim() === 'Yes';
    }

    controller.physicalDrives.push(drive);
  }

  for (const entry of response.Cachevault_Info ?? []) {
    const cachevault = cachevaultSchema.safeParse(entry);
    const temperature = cachevault.success ? firstNumber(cachevault.data.Temp, /(-?\d+(?:\.\d+)?)/) : undefined;
    if (temperature === undefined) {
      issues.push(`controller ${index}: cachevault temperature unreadable`);
      continue;
    }
    controller.cachevaultTemperatures.push(temperature);
  }

  return controller;
}

// Older firmware misspells the key
function rocTemperature(hwCfg: Record<string, unknown>): number | undefined {
  const value =
    hwCfg['ROC temperature(Degree Celsius)'] ?? hwCfg['ROC temperature(Degree Celcius)'];
  return toNumber(value);
}

// "Patrol Read Reoccurrence" reads e.g. "168 hrs" when scheduled
function patrolRead(tasks: Record<string, unknown> | undefined): boolean | undefined {
  const reoccurrence = tasks?.['Patrol Read Reoccurrence'];
  return typeof reoccurrence === 'string' ? reoccurrence.includes('hrs') : undefined;
}

// Both clocks are printed as "MM/DD/YYYY, HH:MM:SS"
function clockSkew(controller: string | undefined, system: string | undefined): number | undefined {
  if (controller === undefined || system === undefined) return undefined;
  const read = (value: string): number | undefined => {
    const [date = '', time = ''] = value.split(',').map((part) => part.trim());
    return utcSeconds(date, time);
  };
  const controllerSeconds = read(controller);
  const systemSeconds = read(system);
  if (controllerSeconds === undefined || systemSeconds === undefined) return undefined;
  return Math.abs(systemSeconds - controllerSeconds);
}

// "4096MB" or a bare number of MB
function megabytes(value: unknown): number | undefined {
  const mb = typeof value === 'string' ? firstNumber(value, /(\d+(?:\.\d+)?)/) : toNumber(value);
  return mb === undefined ? undefined : mb * 1024 * 1024;
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * HBA responses have no "PD LIST"; drives appear as "Drive /cX/eY/sZ" arrays
 * next to their "- Detailed Information" objects.
 */
function basicDriveEntries(deviceInfo: Record<string, unknown>): unknown[] {
  const entries: unknown[] = [];
  for (const [key, value] of Object.entries(deviceInfo)) {
    if (key.includes('Detailed Information')) continue;
    if (Array.isArray(value) && value.length > 0) {
      entries.push(value[0]);
    }
  }
  return entries;
}

function driveState(
  deviceInfo: Record<string, unknown>,
  controller: number,
  enclosure: string,
  slot: string,
): z.infer<typeof driveStateSchema> | undefined {
  const drive = enclosure === '' ? `Drive /c${controller}/s${slot}` : `Drive /c${controller}/e${enclosure}/s${slot}`;
  const detailed = z.record(z.unknown()).safeParse(deviceInfo[`${drive} - Detailed Information`]);
  if (!detailed.success) return undefined;

  const state = driveStateSchema.safeParse(detailed.data[`${drive} State`]);
  return state.success ? state.data : undefined;
}
