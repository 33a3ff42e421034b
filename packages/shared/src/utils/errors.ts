import type { CollectorName } from '../types/collector.js';

export class ExporterError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExporterError';
    this.code = code;
  }
}

export class ConfigurationError extends ExporterError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration is invalid:\n${errors.join('\n')}`, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
    this.errors = errors;
  }
}

export class ToolInvocationError extends ExporterError {
  public readonly command: string;

  constructor(message: string, command: string, code = 'TOOL_INVOCATION_ERROR', options?: { cause?: unknown }) {
    super(message, code, options);
    this.name = 'ToolInvocationError';
    this.command = command;
  }
}

export class ToolTimeoutError extends ToolInvocationError {
  public readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`${command} did not exit within ${timeoutMs}ms`, command, 'TOOL_TIMEOUT');
    this.name = 'ToolTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ToolSpawnError extends ToolInvocationError {
  constructor(command: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to start ${command}: ${reason}`, command, 'TOOL_SPAWN_FAILED', { cause });
    this.name = 'ToolSpawnError';
  }
}

export class ToolOutputLimitError extends ToolInvocationError {
  public readonly limitBytes: number;

  constructor(command: string, limitBytes: number) {
    super(`${command} produced more than ${limitBytes} bytes of output`, command, 'TOOL_OUTPUT_LIMIT');
    this.name = 'ToolOutputLimitError';
    this.limitBytes = limitBytes;
  }
}

export class ParseError extends ExporterError {
  public readonly tool: string;

  constructor(tool: string, message: string, options?: { cause?: unknown }) {
    super(`Unable to parse ${tool} output: ${message}`, 'PARSE_ERROR', options);
    this.name = 'ParseError';
    this.tool = tool;
  }
}

export class CollectorError extends ExporterError {
  public readonly collector: CollectorName;

  constructor(collector: CollectorName, cause: unknown, code = 'COLLECTOR_FAILED') {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Collector ${collector} failed: ${reason}`, code, { cause });
    this.name = 'CollectorError';
    this.collector = collector;
  }
}

export class CollectorTimeoutError extends CollectorError {
  public readonly budgetMs: number;

  constructor(collector: CollectorName, budgetMs: number) {
    super(collector, `no result within ${budgetMs}ms`, 'COLLECTOR_TIMEOUT');
    this.name = 'CollectorTimeoutError';
    this.budgetMs = budgetMs;
  }
}

export class ServerStartError extends ExporterError {
  constructor(address: string, port: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot listen on ${address}:${port}: ${reason}`, 'SERVER_START_FAILED', { cause });
    this.name = 'ServerStartError';
  }
}
