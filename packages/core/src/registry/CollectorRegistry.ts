import {
  COLLECTOR_NAMES,
  ConfigurationError,
  getLogger,
  type CollectorName,
  type ExporterConfig,
} from '@disk-exporter/shared';
import type { ToolRunner } from '../invoker/ToolInvoker.js';
import { IpmitoolSelCollector } from '../collectors/IpmitoolSelCollector.js';
import { MegaCliCollector } from '../collectors/MegaCliCollector.js';
import { PercCliCollector } from '../collectors/PercCliCollector.js';
import { SmartctlCollector } from '../collectors/SmartctlCollector.js';
import type { Collector, CollectorDeps } from '../collectors/types.js';

const logger = getLogger();

const FACTORIES: Readonly<Record<CollectorName, (deps: CollectorDeps) => Collector>> = {
  smartctl: (deps) => new SmartctlCollector(deps),
  megacli: (deps) => new MegaCliCollector(deps),
  perccli: (deps) => new PercCliCollector(deps),
  ipmitool: (deps) => new IpmitoolSelCollector(deps),
};

/**
 * Throws ConfigurationError for toggle combinations that cannot run together.
 */
export function validateCollectorSelection(config: ExporterConfig): void {
  if (config.collectors.megacli.enabled && config.collectors.perccli.enabled) {
    throw new ConfigurationError([
      'DISK_EXPORTER_MEGACLI_ENABLED and DISK_EXPORTER_PERCCLI_ENABLED cannot both be enabled; pick one RAID collector',
    ]);
  }
}

/**
 * The enabled collectors, decided once from configuration and read-only after.
 */
export class CollectorRegistry {
  private readonly collectors: readonly Collector[];

  constructor(config: ExporterConfig, runner: ToolRunner) {
    validateCollectorSelection(config);

    const deps: CollectorDeps = { config, runner };
    this.collectors = Object.freeze(
      COLLECTOR_NAMES.filter((name) => config.collectors[name].enabled).map((name) => FACTORIES[name](deps)),
    );

    if (this.collectors.length === 0) {
      logger.warn('No collectors enabled; only exporter self-metrics will be served');
    } else {
      logger.info({ collectors: this.names() }, 'Collectors enabled');
    }
  }

  activeCollectors(): readonly Collector[] {
    return this.collectors;
  }

  names(): CollectorName[] {
    return this.collectors.map((collector) => collector.name);
  }
}
