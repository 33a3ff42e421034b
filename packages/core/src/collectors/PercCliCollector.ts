import { parseStorcliShowAll, type StorcliController } from '../parsers/storcli.js';
import {
  percControllerState,
  percPhysicalDriveState,
  percVirtualDriveState,
  raidStateCode,
} from '../parsers/states.js';
import { CollectionContext, ToolCollector, describeExit } from './ToolCollector.js';

const SHOW_ALL_ARGS = ['/call', 'show', 'all', 'J'] as const;

const STATE_HELP = '0 = healthy, 1 = degraded, 2 = failed, 3 = unknown';

// BBU status values reported by healthy batteries and capacitor packs
const BBU_HEALTHY = new Set([0, 32]);

export class PercCliCollector extends ToolCollector {
  readonly name = 'perccli' as const;

  protected async gather(ctx: CollectionContext): Promise<void> {
    const result = await this.invoke(SHOW_ALL_ARGS);
    if (result.stdout.trim() === '') {
      throw new Error(describeExit(result));
    }

    const { value: controllers, issues } = parseStorcliShowAll(result.stdout);
    issues.forEach((issue) => ctx.issue(issue));
    for (const controller of controllers) {
      this.addController(ctx, controller);
    }
  }

  private addController(ctx: CollectionContext, controller: StorcliController): void {
    const base = { controller: String(controller.index) };

    ctx.gauge(
      'perccli_controller_info',
      'RAID controller identity',
      {
        ...base,
        model: controller.model,
        serial: controller.serial,
        firmware: controller.firmware,
        bios: controller.biosVersion,
        driver: controller.driver,
      },
      1,
    );

    if (controller.status !== '') {
      ctx.gauge(
        'perccli_controller_status',
        `RAID controller status (${STATE_HELP})`,
        base,
        raidStateCode(percControllerState(controller.status)),
      );
    }
    if (controller.rocTemperatureCelsius !== undefined) {
      ctx.gauge('perccli_controller_temperature_celsius', 'RAID-on-chip temperature', base, controller.rocTemperatureCelsius);
    }
    if (controller.bbuStatus !== undefined) {
      ctx.gauge(
        'perccli_battery_backup_healthy',
        'Battery backup unit health (1 = healthy)',
        base,
        BBU_HEALTHY.has(controller.bbuStatus) ? 1 : 0,
      );
    }
    if (controller.memoryCorrectableErrors !== undefined) {
      ctx.gauge('perccli_memory_errors', 'Controller memory errors', { ...base, type: 'correctable' }, controller.memoryCorrectableErrors);
    }
    if (controller.memoryUncorrectableErrors !== undefined) {
      ctx.gauge('perccli_memory_errors', 'Controller memory errors', { ...base, type: 'uncorrectable' }, controller.memoryUncorrectableErrors);
    }
    if (controller.onboardMemoryBytes !== undefined) {
      ctx.gauge('perccli_memory_size_bytes', 'Controller memory size', { ...base, type: 'total' }, controller.onboardMemoryBytes);
    }
    if (controller.writeCacheBytes !== undefined) {
      ctx.gauge('perccli_memory_size_bytes', 'Controller memory size', { ...base, type: 'write_cache' }, controller.writeCacheBytes);
    }
    if (controller.backendPorts !== undefined) {
      ctx.gauge('perccli_controller_ports', 'Backend ports on the controller', base, controller.backendPorts);
    }
    if (controller.patrolReadScheduled !== undefined) {
      ctx.gauge('perccli_scheduled_patrol_read', 'Patrol read is scheduled (1 = yes)', base, controller.patrolReadScheduled ? 1 : 0);
    }
    if (controller.clockSkewSeconds !== undefined) {
      ctx.gauge(
        'perccli_time_difference_seconds',
        'Difference between the controller clock and the system clock',
        base,
        controller.clockSkewSeconds,
      );
    }
    if (controller.driveGroups !== undefined) {
      ctx.gauge('perccli_drive_groups', 'Drive groups configured on the controller', base, controller.driveGroups);
    }
    this.addDriveCounts(ctx, controller, base);

    for (const vd of controller.virtualDrives) {
      ctx.gauge(
        'perccli_virtual_drive_state',
        `Virtual drive state (${STATE_HELP})`,
        { ...base, dg: vd.driveGroup, vd: vd.virtualDrive, name: vd.name, raid_type: vd.raidType },
        raidStateCode(percVirtualDriveState(vd.state)),
      );
    }

    for (const pd of controller.physicalDrives) {
      const labels = { ...base, enclosure: pd.enclosure, slot: pd.slot };
      ctx.gauge(
        'perccli_physical_drive_state',
        `Physical drive state (${STATE_HELP})`,
        { ...labels, device_id: pd.deviceId, dg: pd.driveGroup, model: pd.model, media: pd.media, interface: pd.interface },
        raidStateCode(percPhysicalDriveState(pd.state)),
      );

      const errors: Array<[string, number | undefined]> = [
        ['media', pd.mediaErrors],
        ['other', pd.otherErrors],
        ['predictive', pd.predictiveFailures],
      ];
      for (const [type, count] of errors) {
        if (count === undefined) continue;
        ctx.gauge('perccli_physical_drive_errors', 'Physical drive error counters', { ...labels, type }, count);
      }

      if (pd.temperatureCelsius !== undefined) {
        ctx.gauge('perccli_physical_drive_temperature_celsius', 'Physical drive temperature', labels, pd.temperatureCelsius);
      }
      if (pd.smartAlert !== undefined) {
        ctx.gauge('perccli_physical_drive_smart_alert', 'Drive has flagged a SMART alert (1 = yes)', labels, pd.smartAlert ? 1 : 0);
      }
    }

    controller.cachevaultTemperatures.forEach((temperature, index) => {
      ctx.gauge(
        'perccli_cachevault_temperature_celsius',
        'CacheVault module temperature',
        { ...base, cachevault: String(index) },
        temperature,
      );
    });
  }

  private addDriveCounts(ctx: CollectionContext, controller: StorcliController, base: { controller: string }): void {
    const help = 'Drives attached to the controller';
    if (controller.virtualDriveCount !== undefined) {
      const states = controller.virtualDrives.map((vd) => vd.state);
      ctx.gauge('perccli_drives', help, { ...base, type: 'virtual', state: 'total' }, controller.virtualDriveCount);
      ctx.gauge('perccli_drives', help, { ...base, type: 'virtual', state: 'offline' }, states.filter((state) => state === 'OfLn').length);
      ctx.gauge('perccli_drives', help, { ...base, type: 'virtual', state: 'degraded' }, states.filter((state) => state === 'Dgrd').length);
    }
    if (controller.physicalDriveCount !== undefined) {
      ctx.gauge('perccli_drives', help, { ...base, type: 'physical', state: 'total' }, controller.physicalDriveCount);
    }
  }
}
