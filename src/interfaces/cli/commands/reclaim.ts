import type { Command } from 'commander';
import { AlreadyRunningError } from '../../../domain/index.js';
import { EXIT_ALREADY_RUNNING } from '../../../application/index.js';
import { lockFor, settingsFromEnv } from '../context.js';
import { error, success, warn } from '../output.js';

export function register(program: Command): void {
  program
    .command('reclaim')
    .description('Remove a stale lock record left by a crashed bridge')
    .action(async () => {
      const settings = settingsFromEnv();
      try {
        const removed = await lockFor(settings).reclaim();
        if (removed) {
          success(`Removed stale lock ${settings.lockPath}`);
        } else {
          warn(`No lock at ${settings.lockPath}`);
        }
      } catch (err: unknown) {
        if (!(err instanceof AlreadyRunningError)) throw err;
        error(err.message, err.code);
        process.exitCode = EXIT_ALREADY_RUNNING;
      }
    });
}
