import { AppError, ErrorCode, isAppError } from '../../common/errors/app-error.js';
import type { Logger } from '../../common/logger.js';
import { pruneHistory, upsertToday } from './daily-history.js';
import { cycleKeyOf, resolveTier, toActiveTier } from './ladder-tier-resolver.js';
import { buildProjection } from './projection.js';
import {
  absorb,
  normalizeRechargeEvents,
  pruneKnownRecharges,
  rechargeTotalSince,
} from './recharge-ledger.js';
import {
  addDays,
  compareDateKeys,
  formatLocal,
  localDateKey,
  parseLocal,
  toLocalWallMs,
} from './time-normalizer.js';
import type {
  AccountSnapshot,
  ActiveTier,
  CycleWarning,
  DailyUsageRecord,
  EngineConfig,
  LadderTier,
  PersistedState,
  RechargeEvent,
  ReconciliationResult,
} from './types.js';
import {
  checkDivergence,
  computeCost,
  deriveUsage,
  relativeDivergence,
  roundUsage,
  usageFromLadderCost,
  type CostComputation,
} from './usage-computer.js';

/**
 * Reconciliation Engine
 *
 * One cycle: normalize recharge times, drop recharges already seen, compute
 * today's and the billing period's cost and usage, resolve the active price
 * tier, upsert today's record. Pure: takes the last persisted state and a
 * snapshot, returns the next state and the result. Persisting is the
 * caller's job.
 *
 * UNINITIALIZED -> TRACKING on the first snapshot; never back.
 */

export interface CycleInput {
  cycleId: string;
  state: PersistedState;
  snapshot: AccountSnapshot;
  config: EngineConfig;
  logger: Logger;
}

export interface CycleOutput {
  state: PersistedState;
  result: ReconciliationResult;
}

interface MonthBaseline {
  balanceCents: number;
  at: string;
  startDate: string;
  rechargeTotalCents: number;
}

interface CycleContext {
  input: CycleInput;
  now: string;
  today: string;
  newEvents: RechargeEvent[];
  knownIds: Map<string, string>;
  cycleKey: string | null;
  warnings: CycleWarning[];
}

export function reconcileSnapshot(input: CycleInput): CycleOutput {
  const { state, snapshot, config, logger } = input;
  const nowMs = toLocalWallMs(snapshot.fetchedAt, config.localOffsetHours);
  const warnings: CycleWarning[] = [];

  if (state.lastPollAt && nowMs < parseLocal(state.lastPollAt)) {
    throw AppError.invalidState('Snapshot is older than the last reconciled poll', {
      entryId: state.entryId,
      lastPollAt: state.lastPollAt,
      fetchedAt: formatLocal(nowMs),
    });
  }

  const { events, rejected } = normalizeRechargeEvents(snapshot.rechargeEvents, config.localOffsetHours);
  for (const event of rejected) {
    logger.warn({ entryId: state.entryId, ...event }, 'Dropping recharge with unusable data');
    warnings.push({
      code: ErrorCode.MALFORMED_TIMESTAMP,
      message: event.reason,
      details: { orderId: event.orderId, createdAtRaw: event.createdAtRaw },
    });
  }

  const { newEvents, updatedKnownIds } = absorb(events, state.knownRechargeIds);

  const context: CycleContext = {
    input,
    now: formatLocal(nowMs),
    today: localDateKey(nowMs),
    newEvents,
    knownIds: updatedKnownIds,
    cycleKey: cycleKeyOf(snapshot.cycleDescription, snapshot.ladderTiers),
    warnings,
  };

  if (state.phase === 'uninitialized') {
    return initialize(context);
  }
  return track(context);
}

// ============================================================================
// UNINITIALIZED -> TRACKING
// ============================================================================

function initialize(context: CycleContext): CycleOutput {
  const { input, now, today } = context;
  const { snapshot } = input;

  // No prior balance to diff against: every recharge present is history
  const record: DailyUsageRecord = {
    date: today,
    usage: 0,
    costCents: 0,
    startBalanceCents: snapshot.balanceCents,
    rechargeTotalCents: 0,
    startedAt: now,
    rechargeIds: [],
    clamped: false,
    updatedAt: now,
  };

  const seeded: PersistedState = {
    ...input.state,
    phase: 'tracking',
    lastBalanceCents: snapshot.balanceCents,
    lastPollAt: now,
    knownRechargeIds: context.knownIds,
    monthBaselineBalanceCents: snapshot.balanceCents,
    monthBaselineAt: now,
    monthStartDate: today,
    monthRechargeTotalCents: 0,
    cycleKey: context.cycleKey,
  };
  const state = upsertToday(seeded, record, today);

  const monthCost = computeCost(snapshot.balanceCents, snapshot.balanceCents, 0);
  const reportedMonthUsage = snapshot.reported?.monthUsage;
  const monthUsage = reportedMonthUsage !== undefined ? roundUsage(Math.max(0, reportedMonthUsage)) : 0;
  const tier = resolveActiveTier(context, monthUsage);

  input.logger.info(
    {
      entryId: state.entryId,
      balanceCents: snapshot.balanceCents,
      knownRecharges: context.knownIds.size,
      cycleKey: context.cycleKey,
    },
    'Baseline established'
  );

  return {
    state,
    result: {
      cycleId: input.cycleId,
      entryId: state.entryId,
      status: 'initialized',
      projection: buildProjection({
        state,
        snapshot,
        today: record,
        monthCost,
        monthUsage,
        tier,
        updatedAt: now,
      }),
      newRecharges: context.newEvents,
      rawTodayCostCents: 0,
      rawMonthCostCents: 0,
      cycleRolledOver: false,
      warnings: context.warnings,
    },
  };
}

// ============================================================================
// TRACKING
// ============================================================================

function requireMonthBaseline(state: PersistedState): MonthBaseline {
  if (state.monthBaselineAt === null || state.monthStartDate === null) {
    throw AppError.invalidState('Tracking state has no month baseline', { entryId: state.entryId });
  }
  return {
    balanceCents: state.monthBaselineBalanceCents,
    at: state.monthBaselineAt,
    startDate: state.monthStartDate,
    rechargeTotalCents: state.monthRechargeTotalCents,
  };
}

/**
 * Today's record so far. A new day continues from the previous poll when
 * that poll happened yesterday, so consumption across midnight is kept.
 * After a longer gap the day starts from the current balance.
 */
function openToday(context: CycleContext): DailyUsageRecord {
  const { input, now, today } = context;
  const { state, snapshot } = input;

  const existing = state.dailyHistory.get(today);
  if (existing) {
    return existing;
  }

  const carryOver =
    state.lastPollAt !== null && addDays(localDateKey(parseLocal(state.lastPollAt)), 1) === today;

  return {
    date: today,
    usage: 0,
    costCents: 0,
    startBalanceCents: carryOver ? state.lastBalanceCents : snapshot.balanceCents,
    rechargeTotalCents: 0,
    startedAt: carryOver && state.lastPollAt !== null ? state.lastPollAt : now,
    rechargeIds: [],
    clamped: false,
    updatedAt: now,
  };
}

function resolveActiveTier(context: CycleContext, monthUsage: number): ActiveTier | null {
  const { snapshot, logger, state } = context.input;

  try {
    const tier = resolveTier(monthUsage, snapshot.ladderTiers);
    return toActiveTier(tier, snapshot.cycleDescription);
  } catch (error) {
    if (!isAppError(error, ErrorCode.NO_APPLICABLE_TIER)) {
      throw error;
    }
    logger.warn({ entryId: state.entryId }, 'No ladder tiers in snapshot; tier fields skipped');
    context.warnings.push({ code: error.code, message: error.message });
    return null;
  }
}

function deriveMonthUsage(
  context: CycleContext,
  monthCost: CostComputation,
  tiers: LadderTier[]
): number | null {
  const { snapshot, config, logger, state } = context.input;
  const reported = snapshot.reported?.monthUsage;

  if (reported !== undefined) {
    const divergence = checkDivergence(reported, monthCost.costCents, tiers);
    if (divergence !== null && divergence > config.usageDivergenceTolerance) {
      logger.warn(
        {
          entryId: state.entryId,
          reportedUsage: reported,
          computedCostCents: monthCost.costCents,
          divergence: Number(divergence.toFixed(4)),
        },
        'Reported usage diverges from balance-derived cost'
      );
    }
    return roundUsage(Math.max(0, reported));
  }

  if (tiers.length > 0) {
    return usageFromLadderCost(monthCost.costCents, tiers);
  }

  return deriveUsage({
    costCents: monthCost.costCents,
    unitPriceCents: snapshot.unitPriceCents ?? null,
  });
}

function checkReportedCost(context: CycleContext, monthCost: CostComputation): void {
  const { snapshot, config, logger, state } = context.input;
  const reported = snapshot.reported?.monthCostCents;
  if (reported === undefined) {
    return;
  }

  const divergence = relativeDivergence(reported, monthCost.costCents);
  if (divergence > config.usageDivergenceTolerance) {
    logger.warn(
      {
        entryId: state.entryId,
        reportedCostCents: reported,
        computedCostCents: monthCost.costCents,
        divergence: Number(divergence.toFixed(4)),
      },
      'Reported month cost diverges from balance-derived cost'
    );
  }
}

function retentionCutoff(today: string, retentionDays: number, monthStartDate: string): string | null {
  if (retentionDays <= 0) {
    return null;
  }
  const cutoff = addDays(today, -retentionDays);
  // Nothing from the current accounting period is ever pruned
  return compareDateKeys(cutoff, monthStartDate) < 0 ? cutoff : monthStartDate;
}

function track(context: CycleContext): CycleOutput {
  const { input, now, today, newEvents } = context;
  const { state, snapshot, config, logger } = input;

  // Cycle rollover is signalled by the schedule changing its cycle identity
  let month = requireMonthBaseline(state);
  const rolledOver =
    context.cycleKey !== null && state.cycleKey !== null && context.cycleKey !== state.cycleKey;

  if (rolledOver) {
    logger.info(
      { entryId: state.entryId, previousCycle: state.cycleKey, cycle: context.cycleKey },
      'Ladder cycle rolled over; resetting month baseline'
    );
    month = {
      balanceCents: snapshot.balanceCents,
      at: now,
      startDate: today,
      rechargeTotalCents: 0,
    };
  } else if (context.cycleKey === null) {
    logger.warn({ entryId: state.entryId }, 'Snapshot carries no ladder cycle description');
  }

  const base = openToday(context);

  const dayStartMs = parseLocal(base.startedAt);
  const dayRecharges = newEvents.filter((event) => event.createdAt >= dayStartMs);
  const dayRechargeTotalCents = base.rechargeTotalCents + rechargeTotalSince(newEvents, dayStartMs);
  const monthRechargeTotalCents = month.rechargeTotalCents + rechargeTotalSince(newEvents, parseLocal(month.at));

  const dayCost = computeCost(base.startBalanceCents, snapshot.balanceCents, dayRechargeTotalCents);
  const monthCost = computeCost(month.balanceCents, snapshot.balanceCents, monthRechargeTotalCents);

  if (dayCost.clamped) {
    logger.info(
      { entryId: state.entryId, date: today, rawCostCents: dayCost.rawCostCents },
      'Negative daily cost clamped to zero'
    );
  }

  const monthUsage = deriveMonthUsage(context, monthCost, snapshot.ladderTiers);
  checkReportedCost(context, monthCost);
  const tier = resolveActiveTier(context, monthUsage ?? 0);

  const todayUsage = deriveUsage({
    costCents: dayCost.costCents,
    unitPriceCents: tier?.unitPriceCents ?? snapshot.unitPriceCents ?? null,
    reportedUsage: snapshot.reported?.todayUsage,
  });

  const record: DailyUsageRecord = {
    date: today,
    // Without any price the last known usage stands
    usage: todayUsage ?? base.usage,
    costCents: dayCost.costCents,
    startBalanceCents: base.startBalanceCents,
    rechargeTotalCents: dayRechargeTotalCents,
    startedAt: base.startedAt,
    rechargeIds: [...base.rechargeIds, ...dayRecharges.map((event) => event.orderId)],
    clamped: dayCost.clamped,
    updatedAt: now,
  };

  let next = upsertToday(
    {
      ...state,
      lastBalanceCents: snapshot.balanceCents,
      lastPollAt: now,
      knownRechargeIds: context.knownIds,
      monthBaselineBalanceCents: month.balanceCents,
      monthBaselineAt: month.at,
      monthStartDate: month.startDate,
      monthRechargeTotalCents,
      cycleKey: context.cycleKey ?? state.cycleKey,
    },
    record,
    today
  );

  const historyCutoff = retentionCutoff(today, config.historyRetentionDays, month.startDate);
  if (historyCutoff) {
    next = pruneHistory(next, historyCutoff);
  }

  const rechargeCutoff = retentionCutoff(today, config.rechargeIdRetentionDays, month.startDate);
  if (rechargeCutoff) {
    next = {
      ...next,
      knownRechargeIds: pruneKnownRecharges(next.knownRechargeIds, next.dailyHistory, {
        cutoffDate: rechargeCutoff,
        monthStartDate: month.startDate,
      }),
    };
  }

  if (newEvents.length > 0) {
    logger.info(
      {
        entryId: state.entryId,
        orderIds: newEvents.map((event) => event.orderId),
        attributedToday: dayRecharges.length,
      },
      'Absorbed new recharges'
    );
  }

  return {
    state: next,
    result: {
      cycleId: input.cycleId,
      entryId: next.entryId,
      status: 'reconciled',
      projection: buildProjection({
        state: next,
        snapshot,
        today: record,
        monthCost,
        monthUsage,
        tier,
        updatedAt: now,
      }),
      newRecharges: newEvents,
      rawTodayCostCents: dayCost.rawCostCents,
      rawMonthCostCents: monthCost.rawCostCents,
      cycleRolledOver: rolledOver,
      warnings: context.warnings,
    },
  };
}
