import { Command } from 'commander';
import { reportStartupFailure, runExporter } from '@disk-exporter/core';

export interface ServeOptions {
  port?: string;
  address?: string;
}

/**
 * Command line flags take precedence over the matching environment variables
 * and go through the same validation.
 */
export function applyServeOptions(env: NodeJS.ProcessEnv, options: ServeOptions): NodeJS.ProcessEnv {
  return {
    ...env,
    ...(options.port !== undefined ? { DISK_EXPORTER_PORT: options.port } : {}),
    ...(options.address !== undefined ? { DISK_EXPORTER_ADDRESS: options.address } : {}),
  };
}

export const serveCommand = new Command('serve')
  .description('Serve disk, RAID and BMC health metrics over HTTP')
  .option('-p, --port <port>', 'Port to listen on (DISK_EXPORTER_PORT)')
  .option('-a, --address <address>', 'Address to bind (DISK_EXPORTER_ADDRESS)')
  .action(async (options: ServeOptions) => {
    try {
      await runExporter(applyServeOptions(process.env, options));
    } catch (err) {
      reportStartupFailure(err);
    }
  });
