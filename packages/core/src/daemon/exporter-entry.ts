import { loadConfig, setLogLevel } from '@disk-exporter/shared';
import { DiskExporter } from './Exporter.js';

/**
 * Loads configuration and serves until a shutdown signal. Startup failures
 * are printed to stderr and end the process with status 1.
 */
export async function runExporter(env: NodeJS.ProcessEnv = process.env): Promise<DiskExporter> {
  const config = loadConfig(env);
  setLogLevel(config.logLevel);

  const exporter = new DiskExporter(config);
  await exporter.start();
  return exporter;
}

export function reportStartupFailure(err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`disk-exporter failed to start: ${message}\n`);
  process.exit(1);
}
