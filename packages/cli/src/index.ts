#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { EXPORTER_VERSION } from '@disk-exporter/shared';
import { serveCommand } from './commands/serve.js';
import { collectCommand } from './commands/collect.js';
import { doctorCommand } from './commands/doctor.js';

const program = new Command();

program
  .name('disk-exporter')
  .version(EXPORTER_VERSION, '-v, --version')
  .description(chalk.bold('disk-exporter') + ': SMART, RAID and BMC event log metrics for Prometheus')
  .addCommand(serveCommand, { isDefault: true })
  .addCommand(collectCommand)
  .addCommand(doctorCommand);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exitCode = 1;
});
