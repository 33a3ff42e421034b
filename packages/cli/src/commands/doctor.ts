import { Command } from 'commander';
import chalk from 'chalk';
import { COLLECTOR_NAMES, loadConfig, type ExporterConfig } from '@disk-exporter/shared';
import { validateCollectorSelection } from '@disk-exporter/core';
import { renderCollectorTable, type CollectorCheck } from '../ui/Table.js';
import { findExecutable } from '../utils/which.js';

export async function checkCollectors(config: ExporterConfig): Promise<CollectorCheck[]> {
  return Promise.all(
    COLLECTOR_NAMES.map(async (name) => {
      const { enabled, path } = config.collectors[name];
      return { name, enabled, command: path, resolved: await findExecutable(path) };
    }),
  );
}

export const doctorCommand = new Command('doctor')
  .description('Check configuration and the tools each enabled collector needs')
  .action(async () => {
    console.log(chalk.bold('\n  Disk exporter doctor\n'));

    let issues = 0;

    // Check Node.js version
    const nodeVersion = process.versions.node;
    const major = Number.parseInt(nodeVersion.split('.')[0] ?? '0', 10);
    if (major >= 20) {
      console.log(chalk.green(`  ✓ Node.js version: ${nodeVersion}`));
    } else {
      console.log(chalk.red(`  ✗ Node.js version: ${nodeVersion} (requires >= 20)`));
      issues++;
    }

    let config: ExporterConfig;
    try {
      config = loadConfig();
    } catch (err) {
      console.log(chalk.red(`  ✗ ${err instanceof Error ? err.message : String(err)}\n`));
      process.exitCode = 1;
      return;
    }
    console.log(chalk.green(`  ✓ Configuration: ${config.address}:${config.port}${config.metricsPath}`));

    try {
      validateCollectorSelection(config);
    } catch (err) {
      console.log(chalk.red(`  ✗ ${err instanceof Error ? err.message : String(err)}`));
      issues++;
    }

    const checks = await checkCollectors(config);
    console.log('');
    console.log(renderCollectorTable(checks));
    console.log('');

    for (const check of checks) {
      if (check.enabled && check.resolved === null) {
        console.log(chalk.red(`  ✗ ${check.name} is enabled but ${check.command} was not found`));
        issues++;
      }
    }

    if (issues > 0) {
      console.log(chalk.red(`  Found ${issues} issue(s) to fix.\n`));
      process.exitCode = 1;
    } else {
      console.log(chalk.green(`  No issues found.\n`));
    }
  });
