import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { getTickerHistory } from '../../core/query-engine.js';
import { serializeHolding, serializeSummary } from '../../output/json-renderer.js';
import type { WebDeps } from '../app.js';

const yearParam = z.coerce.number().int().min(1993).max(2100).optional();

const historyQuery = z.object({
  ticker: z.string().trim().min(1, 'ticker is required').transform(t => t.toUpperCase()),
  since: yearParam,
  until: yearParam,
});

export function registerHoldingsRoutes(server: FastifyInstance, deps: WebDeps) {
  server.get('/api/holdings', async (request, reply) => {
    const parsed = historyQuery.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: { type: 'validation', message: parsed.error.issues[0].message } });
    }

    const { ticker, since, until } = parsed.data;
    if (!deps.resolver.isTracked(ticker)) {
      return reply.status(404).send({ error: { type: 'unknown_ticker', message: `Ticker "${ticker}" is not in the roster` } });
    }

    const history = getTickerHistory(deps.store, ticker, { startYear: since, endYear: until });
    return reply.send({
      ticker,
      count: history.holdings.length,
      holdings: history.holdings.map(serializeHolding),
    });
  });

  server.get('/api/summary', async (request, reply) => {
    const parsed = historyQuery.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: { type: 'validation', message: parsed.error.issues[0].message } });
    }

    const { ticker, since, until } = parsed.data;
    if (!deps.resolver.isTracked(ticker)) {
      return reply.status(404).send({ error: { type: 'unknown_ticker', message: `Ticker "${ticker}" is not in the roster` } });
    }

    const history = getTickerHistory(deps.store, ticker, { startYear: since, endYear: until });
    return reply.send({
      ticker,
      years: history.summaries.map(serializeSummary),
    });
  });
}
