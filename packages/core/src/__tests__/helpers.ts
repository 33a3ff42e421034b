import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import type { ChildProcess } from 'node:child_process';
import { vi } from 'vitest';
import {
  DEFAULT_IPMITOOL_PATH,
  DEFAULT_MEGACLI_PATH,
  DEFAULT_PERCCLI_PATH,
  DEFAULT_SMARTCTL_PATH,
  type CollectorName,
  type ExporterConfig,
} from '@disk-exporter/shared';
import type { RunOptions, ToolResult, ToolRunner } from '../invoker/ToolInvoker.js';

export function createMockChildProcess(overrides: Partial<ChildProcess> = {}): ChildProcess {
  const emitter = new EventEmitter();

  const child = Object.assign(emitter, {
    pid: 99999,
    stdin: null,
    stdout: new PassThrough(),
    stderr: new PassThrough(),
    stdio: [null, null, null],
    connected: false,
    exitCode: null as number | null,
    signalCode: null as NodeJS.Signals | null,
    killed: false,
    channel: undefined,
    kill: vi.fn().mockReturnValue(true),
    send: vi.fn().mockReturnValue(true),
    disconnect: vi.fn(),
    unref: vi.fn(),
    ref: vi.fn(),
    [Symbol.dispose]: vi.fn(),
    serialization: 'json' as const,
    ...overrides,
  }) as unknown as ChildProcess;

  return child;
}

export function createConfig(
  enabled: Partial<Record<CollectorName, boolean>> = {},
  overrides: Partial<Omit<ExporterConfig, 'collectors'>> = {},
): ExporterConfig {
  return {
    address: '127.0.0.1',
    port: 8101,
    metricsPath: '/metrics',
    logLevel: 'info',
    toolTimeoutMs: 1000,
    collectorTimeoutMs: 2000,
    killGraceMs: 100,
    maxOutputBytes: 1024 * 1024,
    selLimit: 100,
    ...overrides,
    collectors: {
      smartctl: { enabled: enabled.smartctl ?? false, path: DEFAULT_SMARTCTL_PATH },
      megacli: { enabled: enabled.megacli ?? false, path: DEFAULT_MEGACLI_PATH },
      perccli: { enabled: enabled.perccli ?? false, path: DEFAULT_PERCCLI_PATH },
      ipmitool: { enabled: enabled.ipmitool ?? false, path: DEFAULT_IPMITOOL_PATH },
    },
  };
}

type StubReply = Partial<Omit<ToolResult, 'command' | 'args'>> | Error | (() => Promise<ToolResult>);

/**
 * ToolRunner answering from a table keyed by "<command> <args...>".
 */
export class StubRunner implements ToolRunner {
  readonly calls: Array<{ command: string; args: readonly string[]; options?: RunOptions }> = [];
  private replies = new Map<string, StubReply>();

  on(commandLine: string, reply: StubReply): this {
    this.replies.set(commandLine, reply);
    return this;
  }

  async run(command: string, args: readonly string[], options?: RunOptions): Promise<ToolResult> {
    this.calls.push({ command, args, options });
    const key = [command, ...args].join(' ');
    const reply = this.replies.get(key);
    if (reply === undefined) {
      throw new Error(`unexpected invocation: ${key}`);
    }
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'function') return reply();
    return {
      command,
      args,
      exitCode: 0,
      signal: null,
      stdout: '',
      stderr: '',
      durationMs: 1,
      ...reply,
    };
  }
}

/** A promise that never settles, for tools that hang */
export function never<T>(): Promise<T> {
  return new Promise<T>(() => undefined);
}
