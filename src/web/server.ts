#!/usr/bin/env node

/**
 * Read API server for holdings-history.
 *
 * Usage:
 *   npm run web                  # Start on default port 3005
 *   PORT=8080 npm run web        # Custom port
 */

import { loadConfig, loadRoster } from '../core/config.js';
import { ConfigError } from '../core/errors.js';
import { closeCache } from '../core/cache.js';
import { logger } from '../core/logger.js';
import { createRuntime, type Runtime } from '../core/query-engine.js';
import { buildServer } from './app.js';

function startup(): { runtime: Runtime; port: number } {
  try {
    const config = loadConfig();
    return { runtime: createRuntime(config, loadRoster(config.ROSTER_PATH)), port: config.PORT };
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

const { runtime, port } = startup();
const server = buildServer(runtime);

function shutdown(): void {
  server.close()
    .then(() => {
      closeCache();
      process.exit(0);
    })
    .catch((err: unknown) => {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'shutdown failed');
      process.exit(1);
    });
}
process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

await server.listen({ port, host: '0.0.0.0' });

console.log(`
  holdings-history read API
  http://localhost:${port}

  API: http://localhost:${port}/api/summary?ticker=NVDA
  Press Ctrl+C to stop
`);
