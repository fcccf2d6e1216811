import type { FastifyInstance } from 'fastify';
import { getInstitutionActivity } from '../../core/query-engine.js';
import { serializeInstitution } from '../../output/json-renderer.js';
import type { WebDeps } from '../app.js';

export function registerMetaRoutes(server: FastifyInstance, deps: WebDeps) {
  server.get('/api/roster', async () => {
    return {
      securities: deps.roster.securities.map(s => ({ ticker: s.ticker, cusip: s.cusip, aliases: s.aliases })),
      institutions: deps.roster.institutions.map(i => ({ cik: i.cik, name: i.name })),
    };
  });

  server.get('/api/institutions', async () => {
    return {
      institutions: getInstitutionActivity(deps.store, deps.roster).map(serializeInstitution),
    };
  });

  server.get('/api/store-stats', async () => {
    const stats = deps.store.stats();
    return {
      indexed_filings: stats.filings,
      processed_filings: stats.processedFilings,
      holdings: stats.holdings,
      tickers: stats.tickers,
    };
  });
}
