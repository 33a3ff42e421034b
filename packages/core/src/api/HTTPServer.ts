import { fastify, type FastifyInstance } from 'fastify';
import { DEFAULT_ADDRESS, DEFAULT_METRICS_PATH, DEFAULT_PORT, ServerStartError, getLogger } from '@disk-exporter/shared';
import type { SnapshotSource } from '../snapshot/SnapshotBuilder.js';
import { registerMetricRoutes } from './routes/metrics.js';

const logger = getLogger();

export interface HTTPServerOptions {
  port?: number;
  host?: string;
  metricsPath?: string;
}

export class HTTPServer {
  private app: FastifyInstance;
  private port: number;
  private host: string;
  private metricsPath: string;

  constructor(source: SnapshotSource, options: HTTPServerOptions = {}) {
    this.port = options.port ?? DEFAULT_PORT;
    this.host = options.host ?? DEFAULT_ADDRESS;
    this.metricsPath = options.metricsPath ?? DEFAULT_METRICS_PATH;

    this.app = fastify({ logger: false });

    this.app.setErrorHandler((err, request, reply) => {
      logger.error({ err, url: request.url }, 'Request failed');
      return reply.code(500).type('text/plain; charset=utf-8').send('Internal server error\n');
    });

    registerMetricRoutes(this.app, source, this.metricsPath);
  }

  /** Underlying instance, for `inject()` in tests */
  get instance(): FastifyInstance {
    return this.app;
  }

  async start(): Promise<void> {
    try {
      await this.app.listen({ port: this.port, host: this.host });
    } catch (err) {
      throw new ServerStartError(this.host, this.port, err);
    }
    logger.info({ port: this.port, host: this.host, path: this.metricsPath }, 'HTTP server listening');
  }

  async stop(): Promise<void> {
    await this.app.close();
  }

  getAddress(): string {
    return `http://${this.host}:${this.port}${this.metricsPath}`;
  }
}
