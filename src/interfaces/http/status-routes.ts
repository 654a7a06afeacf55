import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { HealthSnapshot } from '../../domain/index.js';

export interface ProcessStatus {
  pid: number;
  client_session_id: string;
  lock_path: string;
  uptime_seconds: number;
}

// Must stay a type alias: FastifyPluginOptions requires an index signature.
export type StatusRoutesOptions = {
  snapshot: () => Promise<HealthSnapshot>;
  processStatus: () => ProcessStatus;
};

/**
 * Status API routes.
 *
 * GET /health — current health snapshot; 200 when both broker and queue
 *               are connected, 503 otherwise.
 * GET /status — process identity (pid, broker session id, lock path).
 */
async function statusRoutes(fastify: FastifyInstance, opts: StatusRoutesOptions): Promise<void> {

  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const snapshot = await opts.snapshot();
    const healthy = snapshot.broker_connected && snapshot.queue_connected;
    return reply.status(healthy ? 200 : 503).send(snapshot);
  });

  fastify.get('/status', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send(opts.processStatus());
  });
}

export default fp(statusRoutes, {
  name: 'status-routes',
  fastify: '5.x',
});
