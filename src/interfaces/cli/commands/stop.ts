import type { Command } from 'commander';
import { lockFor, settingsFromEnv } from '../context.js';
import { success, warn } from '../output.js';

export function register(program: Command): void {
  program
    .command('stop')
    .description('Send SIGTERM to the running bridge')
    .action(async () => {
      const inspection = await lockFor(settingsFromEnv()).inspect();
      if (inspection.state !== 'live') {
        warn('Bridge not running');
        return;
      }

      process.kill(inspection.info.pid, 'SIGTERM');
      success(`Sent SIGTERM to PID ${inspection.info.pid}`);
    });
}
