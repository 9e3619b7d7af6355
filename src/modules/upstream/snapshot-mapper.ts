import { Decimal } from 'decimal.js';
import { localDateKey, toLocalWallMs } from '../metering/time-normalizer.js';
import type { AccountSnapshot, LadderTier, RawRechargeEvent, ReportedQuantities } from '../metering/types.js';
import {
  ORDER_STATUS_COMPLETED,
  type EnergyAnalysis,
  type NumericValue,
  type UpstreamOrder,
} from './types.js';

export function toCents(value: NumericValue): number {
  return new Decimal(value).mul(100).toDecimalPlaces(0, Decimal.ROUND_HALF_UP).toNumber();
}

export function toNumber(value: NumericValue): number {
  return new Decimal(value).toNumber();
}

function optionalNumber(value: NumericValue | null | undefined): number | undefined {
  return value === null || value === undefined ? undefined : toNumber(value);
}

function optionalCents(value: NumericValue | null | undefined): number | undefined {
  return value === null || value === undefined ? undefined : toCents(value);
}

export function mapLadderTiers(analysis: EnergyAnalysis): LadderTier[] {
  return (analysis.ladderDtoList ?? []).map((ladder, position) => ({
    index: ladder.ladderLevel ?? position + 1,
    lowerBound: ladder.ladderStartValue == null ? 0 : toNumber(ladder.ladderStartValue),
    upperBound: ladder.ladderEndValue == null ? null : toNumber(ladder.ladderEndValue),
    unitPriceCents: new Decimal(ladder.gasPrice).mul(100).toNumber(),
    cycleDescription: (ladder.ladderCycleDesc ?? analysis.ladderCycleDesc ?? '').trim(),
  }));
}

/**
 * Completed orders only. An order without a time is passed on with an empty
 * timestamp so the engine rejects and reports it.
 */
export function mapRecharges(orders: UpstreamOrder[]): RawRechargeEvent[] {
  return orders
    .filter((order) => order.orderStat === ORDER_STATUS_COMPLETED)
    .map((order) => ({
      orderId: order.orderId,
      amountCents: order.numDesc == null ? 0 : toCents(order.numDesc),
      createdAtRaw: order.createTime ?? '',
    }));
}

function todayUsageFrom(analysis: EnergyAnalysis, today: string): number | undefined {
  const entry = (analysis.dailyUsageList ?? []).find((item) =>
    (item.date ?? item.usageDate ?? '').startsWith(today)
  );
  return entry ? optionalNumber(entry.usage) : undefined;
}

export function mapSnapshot(
  analysis: EnergyAnalysis,
  orders: UpstreamOrder[],
  fetchedAt: Date,
  localOffsetHours: number
): AccountSnapshot {
  const today = localDateKey(toLocalWallMs(fetchedAt, localOffsetHours));

  const reported: ReportedQuantities = {};
  const monthUsage = optionalNumber(analysis.currentMonthUsage);
  const monthCostCents = optionalCents(analysis.currentMonthCost);
  const monthEstimateCostCents = optionalCents(analysis.currentMonthEstimateCost);
  const lastMonthBalanceCents = optionalCents(analysis.lastMonthBalance);
  const todayUsage = todayUsageFrom(analysis, today);
  const totalUsage = optionalNumber(analysis.totalGasCount);
  const availableDays = optionalNumber(analysis.availableDays);
  if (monthUsage !== undefined) reported.monthUsage = monthUsage;
  if (monthCostCents !== undefined) reported.monthCostCents = monthCostCents;
  if (monthEstimateCostCents !== undefined) reported.monthEstimateCostCents = monthEstimateCostCents;
  if (lastMonthBalanceCents !== undefined) reported.lastMonthBalanceCents = lastMonthBalanceCents;
  if (todayUsage !== undefined) reported.todayUsage = todayUsage;
  if (totalUsage !== undefined) reported.totalUsage = totalUsage;
  if (availableDays !== undefined) reported.availableDays = availableDays;

  const snapshot: AccountSnapshot = {
    balanceCents: toCents(analysis.balance),
    arrearsCents: analysis.arrearsAmount == null ? 0 : toCents(analysis.arrearsAmount),
    rechargeEvents: mapRecharges(orders),
    ladderTiers: mapLadderTiers(analysis),
    cycleDescription: analysis.ladderCycleDesc?.trim() || null,
    reported,
    fetchedAt,
  };

  if (analysis.gasPrice != null) {
    snapshot.unitPriceCents = new Decimal(analysis.gasPrice).mul(100).toNumber();
  }

  return snapshot;
}
