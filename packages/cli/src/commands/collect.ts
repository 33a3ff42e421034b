import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { DEFAULT_TEXTFILE_PATH, loadConfig, setLogLevel } from '@disk-exporter/shared';
import { createPipeline, formatSnapshot } from '@disk-exporter/core';
import { formatCollectorStatus } from '../utils/format.js';
import { writeTextfile } from '../utils/textfile.js';

interface CollectOptions {
  output?: string | boolean;
}

export const collectCommand = new Command('collect')
  .description('Run one collection cycle and print the metrics, or write them for a textfile collector')
  .option('-o, --output [file]', `Write the metrics to a file (default: ${DEFAULT_TEXTFILE_PATH})`)
  .action(async (options: CollectOptions) => {
    const spinner = ora({ text: 'Collecting hardware metrics...', stream: process.stderr }).start();

    try {
      const config = loadConfig();
      setLogLevel(config.logLevel);

      const { builder } = createPipeline(config);
      const snapshot = await builder.build();
      const body = formatSnapshot(snapshot);

      spinner.stop();
      for (const status of snapshot.collectors) {
        console.error(formatCollectorStatus(status));
      }

      if (options.output) {
        const path = options.output === true ? DEFAULT_TEXTFILE_PATH : options.output;
        await writeTextfile(path, body);
        console.error(chalk.green(`\n  Metrics written to ${path}\n`));
      } else {
        process.stdout.write(body);
      }
    } catch (err) {
      spinner.fail(`Collection failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
    }
  });
