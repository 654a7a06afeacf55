import { fastify } from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { BackgroundService } from '../../application/index.js';
import statusRoutes from './status-routes.js';
import type { StatusRoutesOptions } from './status-routes.js';

/** Builds the fastify app serving the status routes (not yet listening). */
export async function buildStatusApp(options: StatusRoutesOptions, logLevel: string): Promise<FastifyInstance> {
  const app = fastify({
    logger: {
      level: logLevel,
    },
  });
  await app.register(statusRoutes, options);
  return app;
}

/** Serves the status routes while the bridge holds its lock. */
export class StatusServer implements BackgroundService {
  readonly name = 'status-server';
  private app: FastifyInstance | null = null;

  constructor(
    private readonly options: StatusRoutesOptions,
    private readonly host: string,
    private readonly port: number,
    private readonly logLevel: string,
  ) {}

  async start(): Promise<void> {
    const app = await buildStatusApp(this.options, this.logLevel);
    await app.listen({ host: this.host, port: this.port });
    this.app = app;
  }

  async stop(): Promise<void> {
    if (this.app === null) return;
    await this.app.close();
    this.app = null;
  }
}
