import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

// Route parameters and history range worth seeing next to each cycle's own logs
const entryParamsSchema = z.object({ entry_id: z.string() }).partial();
const rangeQuerySchema = z.object({ from: z.string(), to: z.string() }).partial();

function requestContext(params: unknown, query: unknown) {
  const entry = entryParamsSchema.safeParse(params);
  const range = rangeQuerySchema.safeParse(query);
  return {
    entryId: entry.success ? entry.data.entry_id : undefined,
    from: range.success ? range.data.from : undefined,
    to: range.success ? range.data.to : undefined,
  };
}

async function requestLoggerPlugin(app: FastifyInstance) {
  app.addHook('onRequest', async (request) => {
    request.log.info({
      method: request.method,
      route: request.routeOptions.url,
      ...requestContext(request.params, request.query),
    }, 'Incoming request');
  });

  app.addHook('onResponse', async (request, reply) => {
    request.log.info({
      method: request.method,
      route: request.routeOptions.url,
      entryId: requestContext(request.params, request.query).entryId,
      statusCode: reply.statusCode,
      responseTime: reply.elapsedTime,
    }, 'Request completed');
  });
}

export const requestLogger = fp(requestLoggerPlugin, {
  name: 'request-logger',
});
