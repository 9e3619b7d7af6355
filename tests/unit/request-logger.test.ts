import { describe, it, expect } from 'vitest';
import Fastify from 'fastify';
import { requestLogger } from '../../src/common/middleware/request-logger.js';
import { capturingLogger } from '../helpers.js';

async function buildLoggedApp() {
  const { logger, lines } = capturingLogger();
  const app = Fastify({ logger, disableRequestLogging: true });
  await app.register(requestLogger);
  app.get('/accounts/:entry_id/history', async () => ({ data: [] }));
  app.get('/health', async () => ({ status: 'ok' }));
  await app.ready();
  return { app, lines };
}

describe('requestLogger', () => {
  it('should log the entry and history range of a request', async () => {
    const { app, lines } = await buildLoggedApp();

    await app.inject({ method: 'GET', url: '/accounts/entry-7/history?from=2026-01-01' });
    await app.close();

    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: 'Incoming request',
      method: 'GET',
      route: '/accounts/:entry_id/history',
      entryId: 'entry-7',
      from: '2026-01-01',
    });
    expect(lines[0]).not.toHaveProperty('to');
    expect(lines[1]).toMatchObject({
      msg: 'Request completed',
      route: '/accounts/:entry_id/history',
      entryId: 'entry-7',
      statusCode: 200,
    });
  });

  it('should leave out the entry on routes without one', async () => {
    const { app, lines } = await buildLoggedApp();

    await app.inject({ method: 'GET', url: '/health' });
    await app.close();

    expect(lines[0]).toMatchObject({ msg: 'Incoming request', route: '/health' });
    expect(lines[0]).not.toHaveProperty('entryId');
  });
});
