import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { BackgroundService } from '../../application/index.js';
import { CONTROL_COMMANDS } from '../redis/index.js';
import type { ControlCommand } from '../redis/index.js';
import { ensureRedisConnected } from '../redis/index.js';

export type ControlHandler = (command: ControlCommand) => void;

function isControlCommand(value: unknown): value is ControlCommand {
  return typeof value === 'string' && CONTROL_COMMANDS.some((command) => command === value);
}

/**
 * Accepts both a bare command (`reload_config`) and the JSON form
 * (`{"command":"reload_config"}`). Returns null for anything else.
 */
export function parseControlMessage(message: string): ControlCommand | null {
  const trimmed = message.trim();
  if (isControlCommand(trimmed)) return trimmed;

  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (typeof parsed === 'object' && parsed !== null && 'command' in parsed && isControlCommand(parsed.command)) {
      return parsed.command;
    }
  } catch {
    return null;
  }
  return null;
}

/**
 * Handles one Pub/Sub message. Exported for unit testing; the running
 * bridge goes through `ControlSubscriber`.
 */
export function handleControlMessage(log: Logger, handler: ControlHandler, message: string): void {
  const command = parseControlMessage(message);
  if (command === null) {
    log.warn({ message: message.slice(0, 200) }, 'Ignoring unknown control message');
    return;
  }
  log.info({ command }, 'Control command received');
  handler(command);
}

/**
 * Listens on the control channel while the bridge runs.
 *
 * ioredis needs a dedicated connection for subscriber mode: once a
 * client subscribes it cannot issue regular commands.
 */
export class ControlSubscriber implements BackgroundService {
  readonly name = 'control-subscriber';

  constructor(
    private readonly sub: Redis,
    private readonly channel: string,
    private readonly log: Logger,
    private readonly handler: ControlHandler,
  ) {}

  async start(): Promise<void> {
    await ensureRedisConnected(this.sub);

    this.sub.on('message', (channel: string, message: string) => {
      if (channel !== this.channel) return;
      handleControlMessage(this.log, this.handler, message);
    });

    await this.sub.subscribe(this.channel);
    this.log.info({ channel: this.channel }, 'Subscribed to control channel');
  }

  async stop(): Promise<void> {
    await this.sub.unsubscribe(this.channel);
    await this.sub.quit();
    this.log.info('Control subscriber disconnected');
  }
}
