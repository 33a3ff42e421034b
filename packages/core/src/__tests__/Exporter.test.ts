import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError, ServerStartError } from '@disk-exporter/shared';
import { HTTPServer } from '../api/HTTPServer.js';
import { DiskExporter, createPipeline } from '../daemon/Exporter.js';
import { createConfig, StubRunner } from './helpers.js';

describe('DiskExporter', () => {
  it('should refuse to start with both RAID collectors and never listen', async () => {
    const start = vi.spyOn(HTTPServer.prototype, 'start').mockResolvedValue();
    const exporter = new DiskExporter(createConfig({ megacli: true, perccli: true }), {
      runner: new StubRunner(),
      handleSignals: false,
    });

    await expect(exporter.start()).rejects.toBeInstanceOf(ConfigurationError);
    expect(start).not.toHaveBeenCalled();
    expect(exporter.isRunning).toBe(false);
  });

  it('should start and stop the HTTP server', async () => {
    const start = vi.spyOn(HTTPServer.prototype, 'start').mockResolvedValue();
    const stop = vi.spyOn(HTTPServer.prototype, 'stop').mockResolvedValue();
    const exporter = new DiskExporter(createConfig({ smartctl: true }), {
      runner: new StubRunner(),
      handleSignals: false,
    });

    await exporter.start();
    expect(start).toHaveBeenCalledTimes(1);
    expect(exporter.isRunning).toBe(true);
    expect(exporter.address).toBe('http://127.0.0.1:8101/metrics');

    await exporter.stop();
    expect(stop).toHaveBeenCalledTimes(1);
    expect(exporter.isRunning).toBe(false);
    expect(exporter.address).toBeNull();
  });

  it('should propagate a bind failure', async () => {
    vi.spyOn(HTTPServer.prototype, 'start').mockRejectedValue(
      new ServerStartError('127.0.0.1', 8101, new Error('listen EADDRINUSE')),
    );
    const exporter = new DiskExporter(createConfig(), { runner: new StubRunner(), handleSignals: false });

    await expect(exporter.start()).rejects.toThrow('Cannot listen on 127.0.0.1:8101: listen EADDRINUSE');
    expect(exporter.isRunning).toBe(false);
    expect(exporter.address).toBeNull();
  });

  it('should stop and exit 0 on SIGTERM', async () => {
    vi.spyOn(HTTPServer.prototype, 'start').mockResolvedValue();
    const stop = vi.spyOn(HTTPServer.prototype, 'stop').mockResolvedValue();
    const exit = vi.fn();
    const exporter = new DiskExporter(createConfig(), { runner: new StubRunner(), exit });
    const listeners = process.listenerCount('SIGINT');

    await exporter.start();
    expect(process.listenerCount('SIGINT')).toBe(listeners + 1);

    process.emit('SIGTERM', 'SIGTERM');
    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(0));

    expect(stop).toHaveBeenCalledTimes(1);
    expect(process.listenerCount('SIGINT')).toBe(listeners);
  });
});

describe('createPipeline', () => {
  it('should build a snapshot from the enabled collectors only', async () => {
    const runner = new StubRunner().on('ipmitool sel list', { stdout: 'SEL has no entries\n' });
    const { registry, builder } = createPipeline(createConfig({ ipmitool: true }), runner);

    const snapshot = await builder.build();

    expect(registry.names()).toEqual(['ipmitool']);
    expect(snapshot.collectors.map((status) => [status.collector, status.success])).toEqual([['ipmitool', true]]);
    expect(runner.calls).toHaveLength(1);
  });
});

describe('HTTPServer', () => {
  it('should wrap listen errors in ServerStartError', async () => {
    const server = new HTTPServer({ build: vi.fn() }, { host: '127.0.0.1', port: 8101 });
    vi.spyOn(server.instance, 'listen').mockRejectedValue(new Error('listen EADDRINUSE: address already in use'));

    await expect(server.start()).rejects.toBeInstanceOf(ServerStartError);
    await expect(server.start()).rejects.toThrow(
      'Cannot listen on 127.0.0.1:8101: listen EADDRINUSE: address already in use',
    );
  });

  it('should answer scrapes through the registered routes', async () => {
    const build = vi.fn().mockResolvedValue({ createdAt: new Date(0), metrics: [], collectors: [] });
    const server = new HTTPServer({ build }, { metricsPath: '/metrics' });

    const res = await server.instance.inject({ method: 'GET', url: '/metrics' });

    expect(res.statusCode).toBe(200);
    expect(server.getAddress()).toBe('http://0.0.0.0:8101/metrics');
    await server.stop();
  });
});
