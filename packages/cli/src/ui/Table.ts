import Table from 'cli-table3';
import chalk from 'chalk';
import type { CollectorName } from '@disk-exporter/shared';
import { formatFound } from '../utils/format.js';

export interface CollectorCheck {
  name: CollectorName;
  enabled: boolean;
  command: string;
  /** Where the command was found, or null */
  resolved: string | null;
}

export function renderCollectorTable(checks: CollectorCheck[]): string {
  const table = new Table({
    head: [chalk.bold('collector'), chalk.bold('enabled'), chalk.bold('command'), chalk.bold('found')],
    style: {
      head: [],
      border: ['gray'],
    },
  });

  for (const check of checks) {
    table.push([
      check.name,
      check.enabled ? chalk.green('yes') : chalk.gray('no'),
      check.command,
      check.enabled ? formatFound(check.resolved) : chalk.gray(check.resolved ?? '-'),
    ]);
  }

  return table.toString();
}
