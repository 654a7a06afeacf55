import { runBridge } from './bootstrap.js';

/**
 * Standalone bridge process: drains the Redis queue into the MQTT broker
 * until SIGINT or SIGTERM. Equivalent to `mqtt-bridge start`.
 */
runBridge({ force: process.argv.includes('--force') })
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error('Bridge crashed', err);
    process.exit(1);
  });
