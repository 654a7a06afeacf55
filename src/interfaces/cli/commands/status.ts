import type { Command } from 'commander';
import { EXIT_ALREADY_RUNNING, EXIT_OK } from '../../../application/index.js';
import { lockFor, settingsFromEnv } from '../context.js';
import { success, warn } from '../output.js';

export function register(program: Command): void {
  program
    .command('status')
    .description('Show whether a bridge instance holds the lock')
    .addHelpText('after', '\nExits 0 when a bridge is running, 3 otherwise.')
    .action(async () => {
      const settings = settingsFromEnv();
      const inspection = await lockFor(settings).inspect();

      switch (inspection.state) {
        case 'live':
          success(`Bridge running (PID ${inspection.info.pid})`, inspection.info);
          process.exitCode = EXIT_OK;
          return;
        case 'stale':
          warn(`Stale lock at ${settings.lockPath}` + (inspection.info ? ` (dead PID ${inspection.info.pid})` : ''));
          break;
        case 'absent':
          warn('Bridge not running');
          break;
      }
      process.exitCode = EXIT_ALREADY_RUNNING;
    });
}
