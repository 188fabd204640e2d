#!/usr/bin/env node

/**
 * HTTP API server.
 *
 * Usage:
 *   npm run web                  # Start on default port 8000
 *   PORT=8080 npm run web        # Custom port
 */

import { loadConfigFromEnvironment, requireApiKey } from '../core/config.js';
import { CompaniesHouseClient } from '../core/registry-client.js';
import { logError, logInfo, setLogLevel } from '../core/logger.js';
import { buildServer } from './app.js';

const config = loadConfigFromEnvironment();
setLogLevel(config.logLevel);

try {
  requireApiKey(config);
} catch (err) {
  logError(err instanceof Error ? err.message : String(err));
  process.exit(1);
}

const client = new CompaniesHouseClient(config.registry);
const server = await buildServer({ config, client });

const { port, host } = config.server;
await server.listen({ port, host });

logInfo(`Companies House search API listening on http://localhost:${port}`);
logInfo(`CORS origins: ${config.server.corsOrigins.join(', ')}`);

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    logInfo(`Received ${signal}, shutting down`);
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logError(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }
    );
  });
}
