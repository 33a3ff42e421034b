import type { ChildProcess } from 'node:child_process';
import { DEFAULT_KILL_GRACE, getLogger, parseDuration } from '@disk-exporter/shared';

const logger = getLogger();

export interface ShutdownOptions {
  graceMs?: number;
}

/**
 * Stop a child process that has outlived its deadline.
 *
 * Sequence:
 * 1. Send SIGTERM
 * 2. Wait graceMs
 * 3. Send SIGKILL
 *
 * Resolves with the exit code, or null when the process died by signal or
 * could not be signalled.
 */
export function gracefulShutdown(
  child: ChildProcess,
  options: ShutdownOptions = {},
): Promise<number | null> {
  const { graceMs = parseDuration(DEFAULT_KILL_GRACE) } = options;

  return new Promise((resolve) => {
    let resolved = false;

    const done = (code: number | null) => {
      if (!resolved) {
        resolved = true;
        resolve(code);
      }
    };

    child.once('exit', (code: number | null) => done(code));

    if (child.exitCode !== null || child.signalCode !== null) {
      done(child.exitCode);
      return;
    }

    try {
      child.kill('SIGTERM');
    } catch (err) {
      logger.debug({ err, pid: child.pid }, 'SIGTERM could not be delivered');
      done(null);
      return;
    }

    const killTimer = setTimeout(() => {
      if (resolved) return;
      try {
        child.kill('SIGKILL');
      } catch (err) {
        logger.debug({ err, pid: child.pid }, 'SIGKILL could not be delivered');
      }
      // Give SIGKILL a moment to take effect
      setTimeout(() => done(null), 500).unref();
    }, graceMs);

    killTimer.unref();
  });
}
