import { exporterEnvSchema } from '../schemas/config.schema.js';
import type { ExporterConfig, ToolConfig } from '../types/config.js';
import { ConfigurationError } from './errors.js';

function tool(enabled: boolean, path: string): ToolConfig {
  return Object.freeze({ enabled, path });
}

/**
 * Build the process-wide configuration from environment variables.
 * Called once at startup; the returned object is frozen.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExporterConfig {
  const result = exporterEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const vars = result.data;

  return Object.freeze({
    address: vars.DISK_EXPORTER_ADDRESS,
    port: vars.DISK_EXPORTER_PORT,
    metricsPath: vars.DISK_EXPORTER_METRICS_PATH,
    logLevel: vars.DISK_EXPORTER_LOG_LEVEL,
    toolTimeoutMs: vars.DISK_EXPORTER_TOOL_TIMEOUT,
    collectorTimeoutMs: vars.DISK_EXPORTER_COLLECTOR_TIMEOUT,
    killGraceMs: vars.DISK_EXPORTER_KILL_GRACE,
    maxOutputBytes: vars.DISK_EXPORTER_MAX_OUTPUT,
    selLimit: vars.DISK_EXPORTER_SEL_LIMIT,
    collectors: Object.freeze({
      smartctl: tool(vars.DISK_EXPORTER_SMARTCTL_ENABLED, vars.DISK_EXPORTER_SMARTCTL_PATH),
      megacli: tool(vars.DISK_EXPORTER_MEGACLI_ENABLED, vars.DISK_EXPORTER_MEGACLI_PATH),
      perccli: tool(vars.DISK_EXPORTER_PERCCLI_ENABLED, vars.DISK_EXPORTER_PERCCLI_PATH),
      ipmitool: tool(vars.DISK_EXPORTER_IPMITOOL_ENABLED, vars.DISK_EXPORTER_IPMITOOL_PATH),
    }),
  });
}
