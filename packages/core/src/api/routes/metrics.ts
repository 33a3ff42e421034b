import type { FastifyInstance } from 'fastify';
import { EXPOSITION_CONTENT_TYPE, getLogger } from '@disk-exporter/shared';
import { formatSnapshot } from '../../exposition/format.js';
import type { SnapshotSource } from '../../snapshot/SnapshotBuilder.js';

const logger = getLogger();

export function registerMetricRoutes(
  app: FastifyInstance,
  source: SnapshotSource,
  metricsPath: string,
): void {
  // A fresh snapshot per scrape
  app.get(metricsPath, async (_request, reply) => {
    try {
      const snapshot = await source.build();
      return reply.type(EXPOSITION_CONTENT_TYPE).send(formatSnapshot(snapshot));
    } catch (err) {
      logger.error({ err }, 'Scrape failed');
      return reply.code(500).type('text/plain; charset=utf-8').send('Failed to collect metrics\n');
    }
  });

  app.get('/health', async () => ({ status: 'ok' }));

  app.get('/', async (_request, reply) => {
    return reply
      .type('text/plain; charset=utf-8')
      .send(`Disk exporter. Metrics are served at ${metricsPath}\n`);
  });
}
