import Fastify, { type FastifyInstance } from 'fastify';
import type { HoldingsStore } from '../core/holdings-store.js';
import type { IdentifierResolver } from '../core/resolver.js';
import type { Roster } from '../core/types.js';
import { logger } from '../core/logger.js';
import { registerHoldingsRoutes } from './routes/holdings.js';
import { registerMetaRoutes } from './routes/meta.js';

/**
 * Read-only API over the holdings store. Serves what `track` has stored;
 * it never crawls the archive itself.
 */

export interface WebDeps {
  store: HoldingsStore;
  resolver: IdentifierResolver;
  roster: Roster;
}

export function buildServer(deps: WebDeps): FastifyInstance {
  const server = Fastify({ logger: false });

  registerHoldingsRoutes(server, deps);
  registerMetaRoutes(server, deps);

  server.setErrorHandler((error: Error, _request, reply) => {
    logger.error({ err: error.message }, 'request failed');
    reply.status(500).send({ error: { type: 'internal', message: 'Internal server error' } });
  });

  return server;
}
