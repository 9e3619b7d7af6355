import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../src/app.js';
import { AppError, ErrorCode } from '../../src/common/errors/app-error.js';
import { HistoryStore } from '../../src/modules/metering/history-store.js';
import { ReconciliationService } from '../../src/modules/metering/service.js';
import type { SnapshotOutcome, SnapshotSource } from '../../src/modules/metering/types.js';
import { silentLogger, snapshot } from '../helpers.js';

// Hands out the queued outcomes in order
class QueuedSource implements SnapshotSource {
  private readonly outcomes: SnapshotOutcome[];

  constructor(...outcomes: SnapshotOutcome[]) {
    this.outcomes = outcomes;
  }

  async fetchSnapshot(): Promise<SnapshotOutcome> {
    const next = this.outcomes.shift();
    if (!next) {
      throw new Error('no snapshot queued');
    }
    return next;
  }
}

const BASELINE: SnapshotOutcome = {
  ok: true,
  snapshot: snapshot({ at: '2026-01-31T00:00:00Z', balanceCents: 50000 }),
};
const NOON: SnapshotOutcome = {
  ok: true,
  snapshot: snapshot({ at: '2026-01-31T04:00:00Z', balanceCents: 48800 }),
};

describe('Metering Routes', () => {
  let dataDir: string;
  let service: ReconciliationService;
  let app: FastifyInstance;

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), 'metering-routes-'));
    service = new ReconciliationService(
      new HistoryStore({ dataDir, logger: silentLogger }),
      { localOffsetHours: 8 },
      silentLogger
    );
    app = await buildApp({ service, logger: false });
  });

  afterEach(async () => {
    await app.close();
    await rm(dataDir, { recursive: true, force: true });
  });

  it('should answer the health check', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'ok' });
  });

  describe('GET /v1/accounts/:entry_id', () => {
    it('should return 404 before the first cycle', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/accounts/entry-1' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({
        code: 'not_found',
        message: 'Reconciled data for entry entry-1 not found',
      });
    });

    it('should present the latest projection', async () => {
      service.registerSource('entry-1', new QueuedSource(BASELINE, NOON));
      await service.refresh('entry-1');
      await service.refresh('entry-1');

      const response = await app.inject({ method: 'GET', url: '/v1/accounts/entry-1' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        entry_id: 'entry-1',
        balance_cents: 48800,
        today: { date: '2026-01-31', usage: 4, cost_cents: 1200, recharge_total_cents: 0 },
        month: {
          start_date: '2026-01-31',
          usage: 4,
          cost_cents: 1200,
          raw_cost_cents: 1200,
          estimated_cost_cents: null,
        },
        tier: { index: 1, unit_price_cents: 300, description: 'cycle-2026' },
        last_month_balance_cents: null,
        ladder: { cycle_description: 'cycle-2026', total_tiers: 3 },
        daily_stats: { total_days: 1, average: 4, max: 4, min: 4, total: 4 },
        updated_at: '2026-01-31T12:00:00',
      });
      expect(response.json().ladder.tiers[2]).toEqual({
        index: 3,
        lower_bound: 400,
        upper_bound: 0,
        unit_price_cents: 400,
        cycle_description: 'cycle-2026',
      });
    });
  });

  describe('POST /v1/accounts/:entry_id/refresh', () => {
    it('should run a cycle and return its result', async () => {
      service.registerSource('entry-1', new QueuedSource(BASELINE));

      const response = await app.inject({ method: 'POST', url: '/v1/accounts/entry-1/refresh' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        entry_id: 'entry-1',
        status: 'initialized',
        cycle_rolled_over: false,
        raw_today_cost_cents: 0,
        new_recharges: [],
        projection: { balance_cents: 50000 },
      });
    });

    it('should answer 502 with the failure when the upstream fails', async () => {
      const failure = AppError.upstream(ErrorCode.UPSTREAM_NETWORK_ERROR, 'Upstream unavailable (HTTP 503)');
      service.registerSource('entry-1', new QueuedSource({ ok: false, failure }));

      const response = await app.inject({ method: 'POST', url: '/v1/accounts/entry-1/refresh' });

      expect(response.statusCode).toBe(502);
      expect(response.json()).toMatchObject({
        status: 'failed',
        failure: { code: 'upstream_network_error', message: 'Upstream unavailable (HTTP 503)' },
        projection: null,
      });
    });

    it('should return 404 for an entry without a source', async () => {
      const response = await app.inject({ method: 'POST', url: '/v1/accounts/entry-9/refresh' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({ code: 'not_found' });
    });
  });

  describe('GET /v1/accounts/:entry_id/history', () => {
    it('should list records and stats in the range', async () => {
      service.registerSource('entry-1', new QueuedSource(BASELINE, NOON));
      await service.refresh('entry-1');
      await service.refresh('entry-1');

      const response = await app.inject({
        method: 'GET',
        url: '/v1/accounts/entry-1/history?from=2026-01-01&to=2026-01-31',
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body).toMatchObject({
        entry_id: 'entry-1',
        from: '2026-01-01',
        to: '2026-01-31',
        stats: { total_days: 1, total: 4 },
      });
      expect(body.data).toEqual([
        {
          date: '2026-01-31',
          usage: 4,
          cost_cents: 1200,
          start_balance_cents: 50000,
          recharge_total_cents: 0,
          started_at: '2026-01-31T08:00:00',
          recharge_ids: [],
          clamped: false,
          updated_at: '2026-01-31T12:00:00',
        },
      ]);
    });

    it('should reject a malformed date with 400', async () => {
      service.registerSource('entry-1', new QueuedSource());

      const response = await app.inject({ method: 'GET', url: '/v1/accounts/entry-1/history?from=yesterday' });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        code: 'invalid_request',
        message: 'from must be a YYYY-MM-DD date',
      });
    });

    it('should return 404 for an unknown entry', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/accounts/entry-9/history' });

      expect(response.statusCode).toBe(404);
    });
  });

  describe('DELETE /v1/accounts/:entry_id/state', () => {
    it('should forget the entry\'s state', async () => {
      service.registerSource('entry-1', new QueuedSource(BASELINE));
      await service.refresh('entry-1');

      const response = await app.inject({ method: 'DELETE', url: '/v1/accounts/entry-1/state' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ entry_id: 'entry-1', removed: true });

      const after = await app.inject({ method: 'GET', url: '/v1/accounts/entry-1' });
      expect(after.statusCode).toBe(404);
    });
  });
});
