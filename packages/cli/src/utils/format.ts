import chalk from 'chalk';
import { formatDuration, type CollectorStatus } from '@disk-exporter/shared';

export function statusIcon(ok: boolean): string {
  return ok ? chalk.green('✓') : chalk.red('✗');
}

export function formatCollectorStatus(status: CollectorStatus): string {
  const duration = chalk.gray(formatDuration(status.durationMs));
  const issues = status.issues > 0 ? chalk.yellow(` (${status.issues} skipped)`) : '';
  const line = `  ${statusIcon(status.success)} ${status.collector} ${duration}${issues}`;
  return status.error ? `${line}\n    ${chalk.red(status.error)}` : line;
}

export function formatFound(path: string | null): string {
  return path ? chalk.green(path) : chalk.red('not found');
}
