/**
 * Liveness HTTP server
 * Answers every GET with 200 so an external pinger can keep the host awake
 */

import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import type { KeepaliveConfig } from '../../types/index.js';
import type { LoggerLike } from '../../utils/logger.js';

export const KEEPALIVE_BODY = 'OK - Steam->Discord notifier is alive.';

function alive(_request: FastifyRequest, reply: FastifyReply): void {
  reply.code(200).type('text/plain; charset=utf-8').send(KEEPALIVE_BODY);
}

/**
 * Build the Fastify app; request logging is off because pingers hit it constantly
 */
export function buildKeepaliveApp(): FastifyInstance {
  const app = Fastify({ logger: false });

  app.get('/', alive);
  app.get('/*', alive);

  return app;
}

export class KeepaliveServer {
  readonly app: FastifyInstance;

  constructor(
    private config: Pick<KeepaliveConfig, 'host' | 'port'>,
    private logger: LoggerLike
  ) {
    this.app = buildKeepaliveApp();
  }

  /**
   * Bind the server; a bind failure is logged and the notifier keeps running
   */
  async start(): Promise<boolean> {
    try {
      const address = await this.app.listen({ host: this.config.host, port: this.config.port });
      this.logger.info(`Keepalive HTTP server on ${address}/`);
      return true;
    } catch (error) {
      this.logger.error('Keepalive server failed to start', error);
      return false;
    }
  }

  async close(): Promise<void> {
    await this.app.close();
  }
}

export function createKeepaliveServer(
  config: Pick<KeepaliveConfig, 'host' | 'port'>,
  logger: LoggerLike
): KeepaliveServer {
  return new KeepaliveServer(config, logger);
}
