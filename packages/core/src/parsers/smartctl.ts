import { z } from 'zod';
import { ParseError } from '@disk-exporter/shared';
import { parseJson, type ParseOutcome } from './types.js';

const TOOL = 'smartctl';

export interface SmartDevice {
  name: string;
  type: string;
  protocol: string;
}

export interface SmartAttribute {
  id: number;
  name: string;
  raw: number;
}

export interface SmartDeviceReport {
  model: string;
  serial: string;
  firmware: string;
  passed?: boolean;
  temperatureCelsius?: number;
  powerOnHours?: number;
  attributes: SmartAttribute[];
  /** Numeric fields of the NVMe health log, keyed by their JSON name */
  nvme: Record<string, number>;
}

const scanSchema = z.object({
  devices: z.array(z.unknown()),
});

const scanDeviceSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  protocol: z.string().optional(),
});

const attributeSchema = z.object({
  id: z.number().int(),
  name: z.string().min(1),
  raw: z.object({ value: z.number() }),
});

const deviceReportSchema = z.object({
  model_name: z.string().optional(),
  scsi_model_name: z.string().optional(),
  serial_number: z.string().optional(),
  firmware_version: z.string().optional(),
  smart_status: z.object({ passed: z.boolean() }).optional(),
  temperature: z.object({ current: z.number() }).optional(),
  power_on_time: z.object({ hours: z.number() }).optional(),
  ata_smart_attributes: z.object({ table: z.array(z.unknown()) }).optional(),
  nvme_smart_health_information_log: z.record(z.unknown()).optional(),
});

/**
 * Parse `smartctl --scan-open --json` into the list of devices to query.
 */
export function parseSmartctlScan(text: string): ParseOutcome<SmartDevice[]> {
  const parsed = scanSchema.safeParse(parseJson(TOOL, text));
  if (!parsed.success) {
    throw new ParseError(TOOL, 'scan output has no "devices" array');
  }

  const issues: string[] = [];
  const devices: SmartDevice[] = [];
  const seen = new Set<string>();

  parsed.data.devices.forEach((entry, index) => {
    const device = scanDeviceSchema.safeParse(entry);
    if (!device.success) {
      issues.push(`scan entry ${index}: ${device.error.issues[0]?.message ?? 'invalid'}`);
      return;
    }
    // --scan-open lists a device once per type it answers to
    if (seen.has(device.data.name)) return;
    seen.add(device.data.name);
    devices.push({
      name: device.data.name,
      type: device.data.type,
      protocol: device.data.protocol ?? 'unknown',
    });
  });

  return { value: devices, issues };
}

/**
 * Parse `smartctl --json --info --health --attributes` for one device.
 */
export function parseSmartctlDevice(text: string): ParseOutcome<SmartDeviceReport> {
  const parsed = deviceReportSchema.safeParse(parseJson(TOOL, text));
  if (!parsed.success) {
    throw new ParseError(TOOL, parsed.error.issues[0]?.message ?? 'unexpected device report');
  }

  const data = parsed.data;
  const issues: string[] = [];
  const attributes: SmartAttribute[] = [];
  const seenIds = new Set<number>();

  for (const entry of data.ata_smart_attributes?.table ?? []) {
    const attribute = attributeSchema.safeParse(entry);
    if (!attribute.success) {
      issues.push(`attribute skipped: ${attribute.error.issues[0]?.message ?? 'invalid'}`);
      continue;
    }
    if (seenIds.has(attribute.data.id)) {
      issues.push(`attribute ${attribute.data.id} listed twice`);
      continue;
    }
    seenIds.add(attribute.data.id);
    attributes.push({
      id: attribute.data.id,
      name: attribute.data.name,
      raw: attribute.data.raw.value,
    });
  }

  const nvme: Record<string, number> = {};
  for (const [key, value] of Object.entries(data.nvme_smart_health_information_log ?? {})) {
    if (typeof value === 'number' && Number.isFinite(value)) {
      nvme[key] = value;
    }
  }

  return {
    value: {
      model: (data.model_name ?? data.scsi_model_name ?? '').trim(),
      serial: (data.serial_number ?? '').trim(),
      firmware: (data.firmware_version ?? '').trim(),
      passed: data.smart_status?.passed,
      temperatureCelsius: data.temperature?.current,
      powerOnHours: data.power_on_time?.hours,
      attributes,
      nvme,
    },
    issues,
  };
}

/**
 * smartctl exit status is a bit mask. Bit 0: command line did not parse,
 * bit 1: device could not be opened. Higher bits report disk health and
 * still come with usable output.
 */
export function smartctlExitIsFatal(exitCode: number | null): boolean {
  if (exitCode === null) return true;
  return (exitCode & 0b11) !== 0;
}
