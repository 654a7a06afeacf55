import type { Command } from 'commander';
import { buildQueueEntry } from '../../../application/index.js';
import { enqueueEntry } from '../../../infrastructure/index.js';
import { settingsFromEnv, withRedis } from '../context.js';
import { success } from '../output.js';

export function register(program: Command): void {
  program
    .command('enqueue <topic> <payload>')
    .description('Push an entry onto the bridge queue')
    .option('--retain', 'Ask the broker to retain the message')
    .addHelpText('after', '\nExample:\n  mqtt-bridge enqueue devices/1/state \'{"on":true}\' --retain')
    .action(async (topic: string, payload: string, opts: { retain?: boolean }) => {
      const settings = settingsFromEnv();
      const entry = buildQueueEntry(topic, payload, { retain: opts.retain === true });
      const depth = await withRedis(settings, (redis) => enqueueEntry(redis, settings.queueKey, entry));
      success(`Queued entry for ${topic}`, { queue: settings.queueKey, depth });
    });
}
