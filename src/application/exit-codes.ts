import { AlreadyRunningError, FatalConnectionError } from '../domain/index.js';

export const EXIT_OK = 0;
export const EXIT_CRASH = 1;
export const EXIT_FATAL_CONNECTION = 2;
export const EXIT_ALREADY_RUNNING = 3;

/** Maps an error that escaped the coordinator to the process exit code. */
export function exitCodeFor(err: unknown): number {
  if (err instanceof AlreadyRunningError) return EXIT_ALREADY_RUNNING;
  if (err instanceof FatalConnectionError) return EXIT_FATAL_CONNECTION;
  return EXIT_CRASH;
}
