import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { getReconciliationService, ReconciliationService } from '../../modules/metering/service.js';

declare module 'fastify' {
  interface FastifyInstance {
    metering: ReconciliationService;
  }
}

export interface MeteringPluginOptions {
  service?: ReconciliationService;
}

async function meteringPlugin(app: FastifyInstance, options: MeteringPluginOptions) {
  const service = options.service ?? getReconciliationService();

  app.decorate('metering', service);
}

export default fp(meteringPlugin, {
  name: 'metering',
});

export { meteringPlugin };
