import { Decimal } from 'decimal.js';
import { listHistory, rollingStats, totalHistoricalUsage } from './daily-history.js';
import type {
  AccountProjection,
  AccountSnapshot,
  ActiveTier,
  DailyUsageRecord,
  LadderSchedule,
  PersistedState,
} from './types.js';
import type { CostComputation } from './usage-computer.js';

export interface ProjectionInput {
  state: PersistedState;
  snapshot: AccountSnapshot;
  today: DailyUsageRecord;
  monthCost: CostComputation;
  monthUsage: number | null;
  tier: ActiveTier | null;
  updatedAt: string;
}

/**
 * Days the balance lasts at the average daily cost seen so far.
 */
export function estimateAvailableDays(balanceCents: number, history: DailyUsageRecord[]): number | null {
  const charged = history.filter((record) => record.costCents > 0);
  if (charged.length === 0 || balanceCents <= 0) {
    return null;
  }

  const averageCost = charged
    .reduce((sum, record) => sum.plus(record.costCents), new Decimal(0))
    .div(charged.length);

  return new Decimal(balanceCents).div(averageCost).floor().toNumber();
}

export function ladderScheduleOf(snapshot: AccountSnapshot): LadderSchedule {
  const tiers = [...snapshot.ladderTiers].sort((a, b) => a.index - b.index);
  return {
    cycleDescription: snapshot.cycleDescription,
    totalTiers: tiers.length,
    tiers,
  };
}

export function buildProjection(input: ProjectionInput): AccountProjection {
  const { state, snapshot, today, monthCost } = input;
  const history = listHistory(state);
  const reported = snapshot.reported ?? {};

  return {
    entryId: state.entryId,
    balanceCents: snapshot.balanceCents,
    arrearsCents: snapshot.arrearsCents,
    lastMonthBalanceCents: reported.lastMonthBalanceCents ?? null,
    today: {
      date: today.date,
      usage: today.usage,
      costCents: today.costCents,
      rechargeTotalCents: today.rechargeTotalCents,
    },
    month: {
      startDate: state.monthStartDate ?? today.date,
      usage: input.monthUsage,
      costCents: reported.monthCostCents ?? monthCost.costCents,
      rawCostCents: monthCost.rawCostCents,
      estimatedCostCents: reported.monthEstimateCostCents ?? null,
      rechargeTotalCents: state.monthRechargeTotalCents,
    },
    totalUsage: reported.totalUsage ?? totalHistoricalUsage(state),
    tier: input.tier,
    ladder: ladderScheduleOf(snapshot),
    dailyStats: rollingStats(state),
    history,
    availableDays: reported.availableDays ?? estimateAvailableDays(snapshot.balanceCents, history),
    updatedAt: input.updatedAt,
  };
}
