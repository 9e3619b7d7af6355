import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { AppError } from '../../common/errors/app-error.js';
import type {
  AccountProjection,
  DailyUsageRecord,
  LadderSchedule,
  ReconciliationResult,
  RollingStats,
} from './types.js';

const entryParamsSchema = z.object({
  entry_id: z.string().min(1),
});

const historyQuerySchema = z.object({
  from: z.string().optional(),
  to: z.string().optional(),
});

function presentRecord(record: DailyUsageRecord) {
  return {
    date: record.date,
    usage: record.usage,
    cost_cents: record.costCents,
    start_balance_cents: record.startBalanceCents,
    recharge_total_cents: record.rechargeTotalCents,
    started_at: record.startedAt,
    recharge_ids: record.rechargeIds,
    clamped: record.clamped,
    updated_at: record.updatedAt,
  };
}

function presentStats(stats: RollingStats) {
  return {
    total_days: stats.totalDays,
    average: stats.average,
    max: stats.max,
    min: stats.min,
    total: stats.total,
  };
}

function presentLadder(ladder: LadderSchedule) {
  return {
    cycle_description: ladder.cycleDescription,
    total_tiers: ladder.totalTiers,
    tiers: ladder.tiers.map((tier) => ({
      index: tier.index,
      lower_bound: tier.lowerBound,
      upper_bound: tier.upperBound,
      unit_price_cents: tier.unitPriceCents,
      cycle_description: tier.cycleDescription,
    })),
  };
}

function presentProjection(projection: AccountProjection) {
  return {
    entry_id: projection.entryId,
    balance_cents: projection.balanceCents,
    arrears_cents: projection.arrearsCents,
    last_month_balance_cents: projection.lastMonthBalanceCents,
    today: {
      date: projection.today.date,
      usage: projection.today.usage,
      cost_cents: projection.today.costCents,
      recharge_total_cents: projection.today.rechargeTotalCents,
    },
    month: {
      start_date: projection.month.startDate,
      usage: projection.month.usage,
      cost_cents: projection.month.costCents,
      raw_cost_cents: projection.month.rawCostCents,
      estimated_cost_cents: projection.month.estimatedCostCents,
      recharge_total_cents: projection.month.rechargeTotalCents,
    },
    total_usage: projection.totalUsage,
    tier: projection.tier
      ? {
          index: projection.tier.index,
          unit_price_cents: projection.tier.unitPriceCents,
          description: projection.tier.description,
        }
      : null,
    ladder: presentLadder(projection.ladder),
    daily_stats: presentStats(projection.dailyStats),
    history: projection.history.map(presentRecord),
    available_days: projection.availableDays,
    updated_at: projection.updatedAt,
  };
}

function presentResult(result: ReconciliationResult) {
  return {
    cycle_id: result.cycleId,
    entry_id: result.entryId,
    status: result.status,
    cycle_rolled_over: result.cycleRolledOver,
    raw_today_cost_cents: result.rawTodayCostCents,
    raw_month_cost_cents: result.rawMonthCostCents,
    new_recharges: result.newRecharges.map((event) => ({
      order_id: event.orderId,
      amount_cents: event.amountCents,
      created_at: event.createdAtLocal,
    })),
    warnings: result.warnings,
    failure: result.failure
      ? { code: result.failure.code, message: result.failure.message }
      : undefined,
    projection: result.projection ? presentProjection(result.projection) : null,
  };
}

export async function meteringRoutes(app: FastifyInstance) {
  const service = app.metering;

  // GET /accounts/:entry_id - Latest projection
  app.get('/:entry_id', {
    schema: {
      description: 'Latest reconciled view of an account',
      tags: ['Accounts'],
    },
  }, async (request) => {
    const { entry_id } = entryParamsSchema.parse(request.params);

    const projection = service.getProjection(entry_id);
    if (!projection) {
      throw AppError.notFound(`Reconciled data for entry ${entry_id}`);
    }

    return presentProjection(projection);
  });

  // GET /accounts/:entry_id/history - Daily records and rolling stats
  app.get('/:entry_id/history', {
    schema: {
      description: 'Daily usage history and rolling statistics',
      tags: ['Accounts'],
    },
  }, async (request) => {
    const { entry_id } = entryParamsSchema.parse(request.params);
    const query = historyQuerySchema.parse(request.query ?? {});

    if (!service.hasEntry(entry_id)) {
      throw AppError.notFound(`Entry ${entry_id}`);
    }

    const view = await service.getHistory(entry_id, query);

    return {
      entry_id: view.entryId,
      from: view.range.from ?? null,
      to: view.range.to ?? null,
      stats: presentStats(view.stats),
      data: view.records.map(presentRecord),
    };
  });

  // POST /accounts/:entry_id/refresh - Run a cycle now
  app.post('/:entry_id/refresh', {
    schema: {
      description: 'Fetch a snapshot and reconcile immediately',
      tags: ['Accounts'],
    },
  }, async (request, reply) => {
    const { entry_id } = entryParamsSchema.parse(request.params);

    const result = await service.refresh(entry_id);

    reply.status(result.status === 'failed' ? 502 : 200);
    return presentResult(result);
  });

  // DELETE /accounts/:entry_id/state - Forget persisted state
  app.delete('/:entry_id/state', {
    schema: {
      description: 'Remove persisted state; the next cycle starts a new baseline',
      tags: ['Accounts'],
    },
  }, async (request) => {
    const { entry_id } = entryParamsSchema.parse(request.params);

    if (!service.hasEntry(entry_id)) {
      throw AppError.notFound(`Entry ${entry_id}`);
    }

    const removed = await service.resetEntry(entry_id);
    return { entry_id, removed };
  });
}
