import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import sensible from '@fastify/sensible';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';

import { env, isDev } from './config/env.js';
import metering from './common/plugins/metering.js';
import { errorHandler } from './common/middleware/error-handler.js';
import { requestLogger } from './common/middleware/request-logger.js';
import type { ReconciliationService } from './modules/metering/service.js';

// Module routes
import { meteringRoutes } from './modules/metering/routes.js';

export interface BuildAppOptions {
  service?: ReconciliationService;
  logger?: boolean;
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger:
      options.logger === false
        ? false
        : {
            level: env.LOG_LEVEL,
            transport: isDev
              ? {
                  target: 'pino-pretty',
                  options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                  },
                }
              : undefined,
          },
    trustProxy: true,
  });

  // ============================================================
  // Core Plugins
  // ============================================================

  // Security headers
  await app.register(helmet, {
    contentSecurityPolicy: false, // API doesn't serve HTML
  });

  // CORS
  await app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
  });

  // Sensible defaults (httpErrors, etc.)
  await app.register(sensible);

  // Rate limiting
  await app.register(rateLimit, {
    max: 100,
    timeWindow: '1 minute',
    keyGenerator: (req) => req.ip,
  });

  // ============================================================
  // Documentation
  // ============================================================

  await app.register(swagger, {
    openapi: {
      info: {
        title: 'Meter Ledger API',
        version: '0.1.0',
        description: 'Usage and billing reconciliation for prepaid utility accounts',
      },
      servers: [
        { url: `http://localhost:${env.PORT}`, description: 'Local' },
      ],
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
  });

  // ============================================================
  // Custom Plugins
  // ============================================================

  // Reconciliation service
  await app.register(metering, { service: options.service });

  // Request logging
  await app.register(requestLogger);

  // Error handling
  app.setErrorHandler(errorHandler);

  // ============================================================
  // Routes
  // ============================================================

  // Health check
  app.get('/health', async () => ({ status: 'ok', timestamp: new Date().toISOString() }));

  // API routes (v1)
  await app.register(
    async (api) => {
      await api.register(meteringRoutes, { prefix: '/accounts' });
    },
    { prefix: '/v1' }
  );

  return app;
}
