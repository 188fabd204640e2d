import type { FastifyInstance } from 'fastify';
import { executeSearchCore } from '../../core/search-engine.js';
import type { RegistryClient } from '../../core/registry-client.js';
import type { SearchConfig } from '../../core/config.js';
import { searchRequestSchema, formatZodError } from '../schemas.js';
import { errorBody, errorToHttpStatus, serializeSearchResult } from '../serialization.js';

export function registerSearchRoutes(server: FastifyInstance, client: RegistryClient, config: SearchConfig) {
  server.post('/api/search', async (request, reply) => {
    const parsed = searchRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send(errorBody('validation', formatZodError(parsed.error)));
    }

    const result = await executeSearchCore(parsed.data, client, {
      deadlineMs: config.deadlineMs,
      enrichmentConcurrency: config.enrichmentConcurrency,
    });

    if (!result.success) {
      return reply.status(errorToHttpStatus(result.error.type)).send({ error: result.error });
    }

    return reply.send(serializeSearchResult(result.result));
  });
}
