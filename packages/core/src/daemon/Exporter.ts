import { EXPORTER_VERSION, getLogger, type ExporterConfig } from '@disk-exporter/shared';
import { HTTPServer } from '../api/HTTPServer.js';
import { ToolInvoker, type ToolRunner } from '../invoker/ToolInvoker.js';
import { CollectorRegistry } from '../registry/CollectorRegistry.js';
import { SnapshotBuilder } from '../snapshot/SnapshotBuilder.js';

const logger = getLogger();

export interface CollectionPipeline {
  registry: CollectorRegistry;
  builder: SnapshotBuilder;
}

export function createToolRunner(config: ExporterConfig): ToolRunner {
  return new ToolInvoker({
    timeoutMs: config.toolTimeoutMs,
    killGraceMs: config.killGraceMs,
    maxOutputBytes: config.maxOutputBytes,
  });
}

/**
 * Registry plus snapshot builder. Throws ConfigurationError before anything
 * is started when the collector selection is invalid.
 */
export function createPipeline(config: ExporterConfig, runner: ToolRunner = createToolRunner(config)): CollectionPipeline {
  const registry = new CollectorRegistry(config, runner);
  const builder = new SnapshotBuilder(registry.activeCollectors(), {
    collectorTimeoutMs: config.collectorTimeoutMs,
  });
  return { registry, builder };
}

export interface ExporterOptions {
  runner?: ToolRunner;
  /** Install SIGINT/SIGTERM handlers that stop and exit */
  handleSignals?: boolean;
  exit?: (code: number) => void;
}

export class DiskExporter {
  private server: HTTPServer | null = null;
  private running = false;
  private signalHandler: ((signal: NodeJS.Signals) => void) | null = null;
  private readonly exit: (code: number) => void;

  constructor(
    private readonly config: ExporterConfig,
    private readonly options: ExporterOptions = {},
  ) {
    this.exit = options.exit ?? ((code) => process.exit(code));
  }

  async start(): Promise<void> {
    if (this.running) return;

    logger.info({ version: EXPORTER_VERSION }, 'Disk exporter starting...');

    const { builder } = createPipeline(this.config, this.options.runner);

    const server = new HTTPServer(builder, {
      port: this.config.port,
      host: this.config.address,
      metricsPath: this.config.metricsPath,
    });
    await server.start();
    this.server = server;
    this.running = true;

    if (this.options.handleSignals ?? true) {
      this.setupSignalHandlers();
    }

    logger.info({ address: this.address }, 'Disk exporter started');
  }

  async stop(): Promise<void> {
    if (!this.running) return;

    logger.info('Disk exporter stopping...');
    this.running = false;
    this.removeSignalHandlers();

    await this.server?.stop();
    this.server = null;

    logger.info('Disk exporter stopped');
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Scrape URL while the server is listening */
  get address(): string | null {
    return this.server?.getAddress() ?? null;
  }

  private setupSignalHandlers(): void {
    const shutdown = (signal: NodeJS.Signals) => {
      logger.info({ signal }, 'Received shutdown signal');
      this.stop().then(
        () => this.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Shutdown failed');
          this.exit(1);
        },
      );
    };

    this.signalHandler = shutdown;
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  }

  private removeSignalHandlers(): void {
    if (!this.signalHandler) return;
    process.off('SIGINT', this.signalHandler);
    process.off('SIGTERM', this.signalHandler);
    this.signalHandler = null;
  }
}
