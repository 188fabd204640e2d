import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { formatExport } from '../../output/export-formatter.js';
import type { ExportFormat } from '../../core/types.js';
import { exportRequestSchema, formatZodError } from '../schemas.js';
import { errorBody } from '../serialization.js';

async function handleExport(request: FastifyRequest, reply: FastifyReply, format: ExportFormat) {
  const parsed = exportRequestSchema.safeParse(request.body);
  if (!parsed.success) {
    return reply.status(400).send(errorBody('validation', formatZodError(parsed.error)));
  }

  const { companies, column_names } = parsed.data;
  if (companies.length === 0) {
    return reply.status(400).send(errorBody('empty_export', 'No companies to export'));
  }

  const columns = parsed.data.columns ?? Object.keys(companies[0]);
  const file = await formatExport({ companies, columns, column_names }, format);

  return reply
    .header('Content-Type', file.contentType)
    .header('Content-Disposition', `attachment; filename=${file.filename}`)
    .send(file.data);
}

export function registerExportRoutes(server: FastifyInstance) {
  server.post('/api/export/csv', async (request, reply) => handleExport(request, reply, 'csv'));
  server.post('/api/export/excel', async (request, reply) => handleExport(request, reply, 'xlsx'));
}
