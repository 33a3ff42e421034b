import { z } from 'zod';
import {
  DEFAULT_ADDRESS,
  DEFAULT_COLLECTOR_TIMEOUT,
  DEFAULT_IPMITOOL_PATH,
  DEFAULT_KILL_GRACE,
  DEFAULT_MAX_OUTPUT,
  DEFAULT_MEGACLI_PATH,
  DEFAULT_METRICS_PATH,
  DEFAULT_PERCCLI_PATH,
  DEFAULT_PORT,
  DEFAULT_SEL_LIMIT,
  DEFAULT_SMARTCTL_PATH,
  DEFAULT_TOOL_TIMEOUT,
} from '../constants.js';
import { parseBooleanFlag, parseBytes, parseDuration } from '../utils/parser.js';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

/** Largest delay `setTimeout` honours; anything longer fires after 1ms */
export const MAX_TIMER_MS = 2_147_483_647;

export function booleanFlagSchema(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') return defaultValue;
      const parsed = parseBooleanFlag(value);
      if (parsed === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `expected one of true/false/1/0/yes/no/on/off, got "${value}"`,
        });
        return z.NEVER;
      }
      return parsed;
    });
}

export function durationSchema(defaultValue: string) {
  return z
    .string()
    .trim()
    .default(defaultValue)
    .transform((value, ctx) => {
      let ms: number;
      try {
        ms = parseDuration(value);
      } catch (err) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
        return z.NEVER;
      }
      if (ms <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be greater than zero' });
        return z.NEVER;
      }
      if (ms > MAX_TIMER_MS) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `must not exceed ${MAX_TIMER_MS}ms (about 24.8 days)`,
        });
        return z.NEVER;
      }
      return ms;
    });
}

export const byteSizeSchema = z
  .string()
  .trim()
  .default(DEFAULT_MAX_OUTPUT)
  .transform((value, ctx) => {
    let size: number;
    try {
      size = parseBytes(value);
    } catch (err) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
      return z.NEVER;
    }
    if (size <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be greater than zero' });
      return z.NEVER;
    }
    return size;
  });

export const portSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, 'must be a whole number')
  .default(String(DEFAULT_PORT))
  .transform(Number)
  .pipe(z.number().int().min(1, 'must be between 1 and 65535').max(65535, 'must be between 1 and 65535'));

const toolPathSchema = (defaultValue: string) => z.string().trim().min(1).default(defaultValue);

/**
 * Environment variables understood by the exporter. Unknown keys are ignored.
 */
export const exporterEnvSchema = z.object({
  DISK_EXPORTER_ADDRESS: z.string().trim().min(1).default(DEFAULT_ADDRESS),
  DISK_EXPORTER_PORT: portSchema,
  DISK_EXPORTER_METRICS_PATH: z
    .string()
    .trim()
    .regex(/^\/\S*$/, "must start with '/' and contain no whitespace")
    .default(DEFAULT_METRICS_PATH),
  DISK_EXPORTER_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  DISK_EXPORTER_TOOL_TIMEOUT: durationSchema(DEFAULT_TOOL_TIMEOUT),
  DISK_EXPORTER_COLLECTOR_TIMEOUT: durationSchema(DEFAULT_COLLECTOR_TIMEOUT),
  DISK_EXPORTER_KILL_GRACE: durationSchema(DEFAULT_KILL_GRACE),
  DISK_EXPORTER_MAX_OUTPUT: byteSizeSchema,
  DISK_EXPORTER_SEL_LIMIT: z
    .string()
    .trim()
    .regex(/^\d+$/, 'must be a whole number')
    .default(String(DEFAULT_SEL_LIMIT))
    .transform(Number),
  DISK_EXPORTER_SMARTCTL_ENABLED: booleanFlagSchema(true),
  DISK_EXPORTER_SMARTCTL_PATH: toolPathSchema(DEFAULT_SMARTCTL_PATH),
  DISK_EXPORTER_MEGACLI_ENABLED: booleanFlagSchema(false),
  DISK_EXPORTER_MEGACLI_PATH: toolPathSchema(DEFAULT_MEGACLI_PATH),
  DISK_EXPORTER_PERCCLI_ENABLED: booleanFlagSchema(true),
  DISK_EXPORTER_PERCCLI_PATH: toolPathSchema(DEFAULT_PERCCLI_PATH),
  DISK_EXPORTER_IPMITOOL_ENABLED: booleanFlagSchema(true),
  DISK_EXPORTER_IPMITOOL_PATH: toolPathSchema(DEFAULT_IPMITOOL_PATH),
});

export type ExporterEnvInput = z.input<typeof exporterEnvSchema>;
export type ValidatedExporterEnv = z.infer<typeof exporterEnvSchema>;
