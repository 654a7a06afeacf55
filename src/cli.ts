#!/usr/bin/env node
import { Command } from 'commander';
import { describeError } from './domain/index.js';
import { register as registerEnqueue } from './interfaces/cli/commands/enqueue.js';
import { register as registerHealth } from './interfaces/cli/commands/health.js';
import { register as registerReclaim } from './interfaces/cli/commands/reclaim.js';
import { register as registerReload } from './interfaces/cli/commands/reload.js';
import { register as registerStart } from './interfaces/cli/commands/start.js';
import { register as registerStatus } from './interfaces/cli/commands/status.js';
import { register as registerStop } from './interfaces/cli/commands/stop.js';
import { error } from './interfaces/cli/output.js';

const VERSION = '1.0.0';

export const program = new Command();

program
  .name('mqtt-bridge')
  .description('Forward entries from a Redis queue to an MQTT broker')
  .version(VERSION);

for (const register of [
  registerStart,
  registerStatus,
  registerStop,
  registerReclaim,
  registerHealth,
  registerEnqueue,
  registerReload,
]) {
  register(program);
}

program.parseAsync(process.argv).catch((err: unknown) => {
  error(describeError(err));
  process.exit(1);
});
