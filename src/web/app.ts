import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { AppConfig } from '../core/config.js';
import type { RegistryClient } from '../core/registry-client.js';
import { logError } from '../core/logger.js';
import { registerSearchRoutes } from './routes/search.js';
import { registerExportRoutes } from './routes/export.js';
import { registerMetaRoutes } from './routes/meta.js';
import { errorBody } from './serialization.js';

// A 10,000-row export posted back from the browser runs to several MB
const BODY_LIMIT_BYTES = 50 * 1024 * 1024;

export interface ServerDependencies {
  config: AppConfig;
  client: RegistryClient;
}

export async function buildServer({ config, client }: ServerDependencies): Promise<FastifyInstance> {
  const server = Fastify({ logger: false, bodyLimit: BODY_LIMIT_BYTES });

  await server.register(cors, {
    origin: config.server.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
  });

  registerSearchRoutes(server, client, config.search);
  registerExportRoutes(server);
  registerMetaRoutes(server);

  server.setErrorHandler((error: FastifyError, request, reply) => {
    // Fastify's own client errors (malformed JSON, oversized body) keep their status
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send(errorBody('validation', error.message));
    }
    logError(`Unhandled error on ${request.method} ${request.url}: ${error.message}`);
    return reply.status(500).send(errorBody('internal', 'Internal server error'));
  });

  return server;
}
