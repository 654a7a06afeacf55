import type { Command } from 'commander';
import { readHealthSnapshot } from '../../../infrastructure/index.js';
import { settingsFromEnv, withRedis } from '../context.js';
import { json, warn } from '../output.js';

export function register(program: Command): void {
  program
    .command('health')
    .description('Print the last health snapshot the bridge wrote to Redis')
    .action(async () => {
      const settings = settingsFromEnv();
      const snapshot = await withRedis(settings, (redis) => readHealthSnapshot(redis, settings.healthKey));

      if (snapshot === null) {
        warn(`No health record at ${settings.healthKey} (bridge stopped or record expired)`);
        process.exitCode = 1;
        return;
      }
      json(snapshot);
    });
}
