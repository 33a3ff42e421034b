import { toSnakeCase } from '../metrics/metric.js';
import {
  parseSmartctlDevice,
  parseSmartctlScan,
  smartctlExitIsFatal,
  type SmartDevice,
} from '../parsers/smartctl.js';
import { CollectionContext, ToolCollector, describeExit } from './ToolCollector.js';

const SCAN_ARGS = ['--scan-open', '--json=c'] as const;

export class SmartctlCollector extends ToolCollector {
  readonly name = 'smartctl' as const;

  protected async gather(ctx: CollectionContext): Promise<void> {
    const scan = await this.invoke(SCAN_ARGS);
    if (smartctlExitIsFatal(scan.exitCode) && scan.stdout.trim() === '') {
      throw new Error(describeExit(scan));
    }

    const { value: devices, issues } = parseSmartctlScan(scan.stdout);
    issues.forEach((issue) => ctx.issue(issue));
    if (devices.length === 0) return;

    const outcomes = await Promise.allSettled(devices.map((device) => this.queryDevice(device)));

    let failures = 0;
    outcomes.forEach((outcome, index) => {
      const device = devices[index];
      if (!device) return;
      if (outcome.status === 'rejected') {
        failures++;
        const reason = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
        ctx.issue(`${device.name}: ${reason}`);
        return;
      }
      outcome.value(ctx);
    });

    if (failures === devices.length) {
      throw new Error(`none of ${devices.length} device(s) could be read`);
    }
  }

  /**
   * Resolves to a writer so that a device's samples are only added once its
   * invocation has completed and parsed.
   */
  private async queryDevice(device: SmartDevice): Promise<(ctx: CollectionContext) => void> {
    const result = await this.invoke([
      '--json=c',
      '--info',
      '--health',
      '--attributes',
      '-d',
      device.type,
      device.name,
    ]);
    if (smartctlExitIsFatal(result.exitCode)) {
      throw new Error(describeExit(result));
    }

    const { value: report, issues } = parseSmartctlDevice(result.stdout);
    const labels = { device: device.name };

    return (ctx) => {
      issues.forEach((issue) => ctx.issue(`${device.name}: ${issue}`));

      ctx.gauge(
        'smartctl_device_info',
        'Identity of a disk reported by smartctl',
        {
          device: device.name,
          type: device.type,
          protocol: device.protocol,
          model: report.model,
          serial: report.serial,
          firmware: report.firmware,
        },
        1,
      );
      ctx.gauge('smartctl_exit_status', 'smartctl exit status bit mask', labels, result.exitCode ?? -1);

      if (report.passed !== undefined) {
        ctx.gauge('smartctl_smart_passed', 'SMART overall health self-assessment (1 = passed)', labels, report.passed ? 1 : 0);
      }
      if (report.temperatureCelsius !== undefined) {
        ctx.gauge('smartctl_device_temperature_celsius', 'Current drive temperature', labels, report.temperatureCelsius);
      }
      if (report.powerOnHours !== undefined) {
        ctx.gauge('smartctl_device_power_on_hours', 'Drive power-on time', labels, report.powerOnHours);
      }

      for (const attribute of report.attributes) {
        const metric = toSnakeCase(attribute.name);
        if (metric === '') {
          ctx.issue(`${device.name}: attribute ${attribute.id} has no usable name`);
          continue;
        }
        ctx.gauge(
          `smartctl_${metric}`,
          `SMART attribute ${attribute.name} (raw value)`,
          { device: device.name, id: String(attribute.id) },
          attribute.raw,
        );
      }

      for (const [field, value] of Object.entries(report.nvme)) {
        ctx.gauge(`smartctl_nvme_${toSnakeCase(field)}`, `NVMe health log field ${field}`, labels, value);
      }
    };
  }
}

