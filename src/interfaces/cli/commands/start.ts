import type { Command } from 'commander';
import { runBridge } from '../../../bootstrap.js';

export function register(program: Command): void {
  program
    .command('start')
    .description('Run the bridge in the foreground until SIGINT or SIGTERM')
    .option('--force', 'Take the instance lock over even if its holder is alive')
    .addHelpText('after', '\nExit codes:\n  0 stopped cleanly\n  1 crash or invalid configuration\n  2 broker unreachable after the reconnect budget\n  3 another instance is running')
    .action(async (opts: { force?: boolean }) => {
      process.exitCode = await runBridge({ force: opts.force === true });
    });
}
