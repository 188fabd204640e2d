import type { FastifyInstance } from 'fastify';
import { getAllSicCodes } from '../../processing/sic-codes.js';
import { COLUMN_DEFINITIONS } from '../../processing/columns.js';

export const API_NAME = 'UK Companies House Search API';
export const API_VERSION = '1.0.0';

export function registerMetaRoutes(server: FastifyInstance) {
  server.get('/', async () => {
    return { message: API_NAME, version: API_VERSION };
  });

  server.get('/health', async () => {
    return { status: 'healthy' };
  });

  server.get('/api/sic-codes', async () => {
    return getAllSicCodes();
  });

  server.get('/api/columns', async () => {
    return {
      columns: COLUMN_DEFINITIONS.map(c => ({
        key: c.key,
        label: c.label,
        truncate: c.truncate,
      })),
    };
  });
}
