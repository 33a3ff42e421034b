import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import {
  DEFAULT_KILL_GRACE,
  DEFAULT_MAX_OUTPUT,
  DEFAULT_TOOL_TIMEOUT,
  ToolOutputLimitError,
  ToolSpawnError,
  ToolTimeoutError,
  getLogger,
  parseBytes,
  parseDuration,
  type ToolInvocationError,
} from '@disk-exporter/shared';
import { gracefulShutdown } from '../process/GracefulShutdown.js';

const logger = getLogger();

export interface ToolResult {
  command: string;
  args: readonly string[];
  /** null when the process was ended by a signal */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export interface RunOptions {
  timeoutMs?: number;
  maxOutputBytes?: number;
}

/**
 * Runs one external diagnostic command. Resolves for every exit status and
 * rejects only with a ToolInvocationError (timeout, spawn failure, output cap).
 */
export interface ToolRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<ToolResult>;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

export interface ToolInvokerOptions {
  timeoutMs?: number;
  killGraceMs?: number;
  maxOutputBytes?: number;
  spawn?: SpawnFn;
}

export class ToolInvoker implements ToolRunner {
  private timeoutMs: number;
  private killGraceMs: number;
  private maxOutputBytes: number;
  private spawnFn: SpawnFn;

  constructor(options: ToolInvokerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? parseDuration(DEFAULT_TOOL_TIMEOUT);
    this.killGraceMs = options.killGraceMs ?? parseDuration(DEFAULT_KILL_GRACE);
    this.maxOutputBytes = options.maxOutputBytes ?? parseBytes(DEFAULT_MAX_OUTPUT);
    this.spawnFn = options.spawn ?? spawn;
  }

  run(command: string, args: readonly string[], options: RunOptions = {}): Promise<ToolResult> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const maxOutputBytes = options.maxOutputBytes ?? this.maxOutputBytes;
    const start = Date.now();

    return new Promise((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = this.spawnFn(command, [...args], {
          stdio: ['ignore', 'pipe', 'pipe'],
          // Vendor tools localise numbers and dates; the parsers expect C locale
          env: { ...process.env, LC_ALL: 'C' },
        });
      } catch (err) {
        reject(new ToolSpawnError(command, err));
        return;
      }

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let outputBytes = 0;
      let settled = false;

      const settle = (finish: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        finish();
      };

      // The caller gets its answer now; the process is reaped in the background
      const abandon = (error: ToolInvocationError) => {
        settle(() => reject(error));
        gracefulShutdown(child, { graceMs: this.killGraceMs }).then(
          (code) => logger.debug({ command, pid: child.pid, code }, 'Abandoned tool process exited'),
          (err: unknown) => logger.error({ err, command }, 'Failed to reap tool process'),
        );
      };

      const timer = setTimeout(() => {
        logger.warn({ command, args, timeoutMs }, 'Tool invocation timed out');
        abandon(new ToolTimeoutError(command, timeoutMs));
      }, timeoutMs);

      const capture = (chunks: Buffer[]) => (chunk: Buffer) => {
        if (settled) return;
        outputBytes += chunk.length;
        if (outputBytes > maxOutputBytes) {
          logger.warn({ command, args, maxOutputBytes }, 'Tool output exceeded limit');
          abandon(new ToolOutputLimitError(command, maxOutputBytes));
          return;
        }
        chunks.push(chunk);
      };

      child.stdout?.on('data', capture(stdout));
      child.stderr?.on('data', capture(stderr));

      child.once('error', (err: Error) => {
        settle(() => reject(new ToolSpawnError(command, err)));
      });

      child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
        settle(() => {
          const result: ToolResult = {
            command,
            args,
            exitCode: code,
            signal,
            stdout: Buffer.concat(stdout).toString('utf8'),
            stderr: Buffer.concat(stderr).toString('utf8'),
            durationMs: Date.now() - start,
          };
          logger.debug(
            { command, args, exitCode: code, durationMs: result.durationMs },
            'Tool invocation finished',
          );
          resolve(result);
        });
      });
    });
  }
}
