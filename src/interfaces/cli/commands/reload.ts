import type { Command } from 'commander';
import { publishControlCommand } from '../../../infrastructure/index.js';
import { settingsFromEnv, withRedis } from '../context.js';
import { success, warn } from '../output.js';

export function register(program: Command): void {
  program
    .command('reload')
    .description('Ask the running bridge to reconnect with the latest broker configuration')
    .action(async () => {
      const settings = settingsFromEnv();
      const receivers = await withRedis(settings, (redis) =>
        publishControlCommand(redis, settings.controlChannel, 'reload_config'),
      );

      if (receivers === 0) {
        warn(`No bridge listening on ${settings.controlChannel}`);
        return;
      }
      success('Reload requested');
    });
}
