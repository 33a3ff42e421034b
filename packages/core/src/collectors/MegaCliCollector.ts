import { parseMegacliLdPdInfo } from '../parsers/megacli.js';
import { megaPhysicalDriveState, megaVirtualDriveState, raidStateCode } from '../parsers/states.js';
import { CollectionContext, ToolCollector, describeExit } from './ToolCollector.js';

const LD_PD_INFO_ARGS = ['-LdPdInfo', '-aALL', '-NoLog'] as const;

const STATE_HELP = '0 = healthy, 1 = degraded, 2 = failed, 3 = unknown';

/**
 * MegaCli can stall the host for minutes while it walks the controllers,
 * which is why it is off unless explicitly enabled.
 */
export class MegaCliCollector extends ToolCollector {
  readonly name = 'megacli' as const;

  protected async gather(ctx: CollectionContext): Promise<void> {
    const result = await this.invoke(LD_PD_INFO_ARGS);
    if (result.exitCode !== 0 && result.stdout.trim() === '') {
      throw new Error(describeExit(result));
    }

    const { value: adapters, issues } = parseMegacliLdPdInfo(result.stdout);
    issues.forEach((issue) => ctx.issue(issue));

    for (const adapter of adapters) {
      for (const vd of adapter.virtualDrives) {
        const base = { adapter: String(adapter.index) };
        ctx.gauge(
          'megacli_virtual_drive_state',
          `Virtual drive state (${STATE_HELP})`,
          { ...base, vd: vd.id, target_id: vd.targetId, name: vd.name, raid_level: vd.raidLevel },
          raidStateCode(megaVirtualDriveState(vd.state)),
        );

        for (const pd of vd.physicalDrives) {
          const labels = { ...base, enclosure: pd.enclosure, slot: pd.slot };
          ctx.gauge(
            'megacli_physical_drive_state',
            `Physical drive state (${STATE_HELP})`,
            { ...labels, device_id: pd.deviceId },
            raidStateCode(megaPhysicalDriveState(pd.state)),
          );

          const errors: Array<[string, number | undefined]> = [
            ['media', pd.mediaErrors],
            ['other', pd.otherErrors],
            ['predictive', pd.predictiveFailures],
          ];
          for (const [type, count] of errors) {
            if (count === undefined) continue;
            ctx.gauge('megacli_physical_drive_errors', 'Physical drive error counters', { ...labels, type }, count);
          }

          if (pd.temperatureCelsius !== undefined) {
            ctx.gauge('megacli_physical_drive_temperature_celsius', 'Physical drive temperature', labels, pd.temperatureCelsius);
          }
          if (pd.smartAlert !== undefined) {
            ctx.gauge('megacli_physical_drive_smart_alert', 'Drive has flagged a SMART alert (1 = yes)', labels, pd.smartAlert ? 1 : 0);
          }
        }
      }
    }
  }
}
