import type { Redis } from 'ioredis';
import { pino } from 'pino';
import type { Logger } from 'pino';
import { ConfigError, initialConnectionState } from './domain/index.js';
import {
  BridgeCoordinator,
  BrokerConnectionManager,
  ConnectionStateStore,
  EXIT_CRASH,
  EXIT_OK,
  HealthMonitor,
  createLogHealthReporter,
  exitCodeFor,
} from './application/index.js';
import type { BackgroundService } from './application/index.js';
import {
  ControlSubscriber,
  ExternalServiceProvisioner,
  FileConfigSource,
  InstanceLock,
  RedisHealthReporter,
  RedisQueueConsumer,
  createMqttTransport,
  createRedisClient,
  deriveSessionId,
  loadRuntimeSettings,
  watchQueueConnection,
} from './infrastructure/index.js';
import type { RuntimeSettings } from './infrastructure/index.js';
import { StatusServer } from './interfaces/http/index.js';

export interface RunBridgeOptions {
  /** Take the instance lock over even if its holder is alive. */
  force?: boolean | undefined;
  env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Assembles the bridge from its settings and runs it until SIGINT or
 * SIGTERM. Resolves with the process exit code.
 */
export async function runBridge(options: RunBridgeOptions = {}): Promise<number> {
  const env = options.env ?? process.env;

  let settings: RuntimeSettings;
  try {
    settings = loadRuntimeSettings(env);
  } catch (err: unknown) {
    if (!(err instanceof ConfigError)) throw err;
    pino().fatal({ err }, 'Invalid bridge settings');
    return EXIT_CRASH;
  }

  const log = pino({ level: settings.logLevel });
  const clientId = deriveSessionId();
  const state = new ConnectionStateStore(initialConnectionState(clientId));
  const startedAt = Date.now();

  // Blocking pops, regular commands and Pub/Sub each need their own connection.
  const commands = createRedisClient(settings.redisUrl);
  const blocking = createRedisClient(settings.redisUrl);
  const subscriber = createRedisClient(settings.redisUrl);
  watchQueueConnection(blocking, state, log);
  commands.on('error', (err: Error) => log.debug({ err }, 'Redis command connection error'));
  subscriber.on('error', (err: Error) => log.debug({ err }, 'Redis subscriber connection error'));

  const source = new RedisQueueConsumer(blocking, commands, state, log, {
    queueKey: settings.queueKey,
    popTimeoutSeconds: settings.popTimeoutSeconds,
  });

  const connection = new BrokerConnectionManager({
    configSource: new FileConfigSource(settings.configPath, env),
    createTransport: createMqttTransport,
    state,
    log,
    clientId,
    onConfigLoaded: (config) => {
      if (config.log_level !== undefined && config.log_level !== log.level) {
        log.info({ from: log.level, to: config.log_level }, 'Applying log level from broker configuration');
        log.level = config.log_level;
      }
    },
  });

  const health = new HealthMonitor(state, source, log, {
    intervalMs: settings.healthIntervalMs,
    reporters: [
      createLogHealthReporter(log),
      new RedisHealthReporter(commands, settings.healthKey, settings.healthTtlSeconds),
    ],
  });

  const lock = new InstanceLock({ path: settings.lockPath, log });
  const services: BackgroundService[] = [];

  const coordinator = new BridgeCoordinator({
    lock,
    provisioner: new ExternalServiceProvisioner([commands, blocking], state, log),
    source,
    connection,
    health,
    state,
    log,
    publishRetryLimit: settings.publishRetryLimit,
    forceLock: options.force,
    services,
  });

  services.push(new ControlSubscriber(subscriber, settings.controlChannel, log, () => coordinator.requestReload()));
  if (settings.statusPort > 0) {
    services.push(
      new StatusServer(
        {
          snapshot: () => health.snapshot(),
          processStatus: () => ({
            pid: process.pid,
            client_session_id: clientId,
            lock_path: settings.lockPath,
            uptime_seconds: Math.round((Date.now() - startedAt) / 1000),
          }),
        },
        settings.statusHost,
        settings.statusPort,
        settings.logLevel,
      ),
    );
  }

  const ac = new AbortController();
  const shutdown = (signal: NodeJS.Signals): void => {
    if (ac.signal.aborted) return;
    log.info({ signal }, 'Shutting down bridge...');
    ac.abort();
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  try {
    log.info({ clientId, queue: settings.queueKey, config: settings.configPath }, 'Bridge starting');
    await coordinator.run(ac.signal);
    log.info('Bridge stopped');
    return EXIT_OK;
  } catch (err: unknown) {
    const code = exitCodeFor(err);
    log.fatal({ err, exitCode: code }, 'Bridge exited with an error');
    return code;
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
    await closeClients([commands, blocking, subscriber], log);
  }
}

async function closeClients(clients: readonly Redis[], log: Logger): Promise<void> {
  for (const client of clients) {
    if (client.status === 'end' || client.status === 'wait') {
      client.disconnect();
      continue;
    }
    try {
      await client.quit();
    } catch (err: unknown) {
      log.debug({ err }, 'Redis client did not quit cleanly');
      client.disconnect();
    }
  }
}
