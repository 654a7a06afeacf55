import type { Redis } from 'ioredis';

export const CONTROL_COMMANDS = ['reload_config'] as const;
export type ControlCommand = (typeof CONTROL_COMMANDS)[number];

/**
 * Sends a control command to the running bridge via Pub/Sub.
 *
 * @returns The number of subscribers that received it (0 = no bridge listening).
 */
export async function publishControlCommand(
  redis: Redis,
  channel: string,
  command: ControlCommand,
): Promise<number> {
  return redis.publish(channel, JSON.stringify({ command }));
}
