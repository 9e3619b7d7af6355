import { Decimal } from 'decimal.js';
import type { LadderTier } from './types.js';
import { sortTiers, effectiveUpperBound } from './ladder-tier-resolver.js';

export interface CostComputation {
  rawCostCents: number;  // Signed, kept for diagnostics
  costCents: number;     // Clamped at zero
  clamped: boolean;
}

const USAGE_DECIMALS = 3;

/**
 * cost = start_balance - current_balance + recharge_total
 *
 * Recharges raise the balance, so they are added back to recover what was
 * actually consumed.
 */
export function computeCost(
  startBalanceCents: number,
  currentBalanceCents: number,
  rechargeTotalCents: number
): CostComputation {
  const rawCostCents = startBalanceCents - currentBalanceCents + rechargeTotalCents;
  return {
    rawCostCents,
    costCents: Math.max(0, rawCostCents),
    clamped: rawCostCents < 0,
  };
}

export function roundUsage(value: Decimal.Value): number {
  return new Decimal(value).toDecimalPlaces(USAGE_DECIMALS, Decimal.ROUND_HALF_UP).toNumber();
}

/**
 * Physical usage for a cost. A quantity reported by the upstream wins;
 * otherwise cost is divided by the unit price. Null when neither is known.
 */
export function deriveUsage(input: {
  costCents: number;
  unitPriceCents: number | null;
  reportedUsage?: number;
}): number | null {
  if (input.reportedUsage !== undefined) {
    return roundUsage(Math.max(0, input.reportedUsage));
  }
  if (input.unitPriceCents === null || input.unitPriceCents <= 0) {
    return null;
  }
  return roundUsage(new Decimal(input.costCents).div(input.unitPriceCents));
}

/**
 * Inverse of tiered pricing: how much was consumed, starting from zero, to
 * spend `costCents` when each band is billed at its own price.
 * Null when a band has no usable price.
 */
export function usageFromLadderCost(costCents: number, tiers: LadderTier[]): number | null {
  const ordered = sortTiers(tiers);
  if (ordered.length === 0) {
    return null;
  }

  let remaining = new Decimal(Math.max(0, costCents));
  let usage = new Decimal(0);

  for (let i = 0; i < ordered.length; i++) {
    const tier = ordered[i];
    if (tier.unitPriceCents <= 0) {
      return null;
    }

    const upper = effectiveUpperBound(tier, i === ordered.length - 1);
    const bandCost = Number.isFinite(upper)
      ? new Decimal(upper - tier.lowerBound).mul(tier.unitPriceCents)
      : null;

    if (bandCost === null || remaining.lte(bandCost)) {
      usage = usage.plus(remaining.div(tier.unitPriceCents));
      return roundUsage(usage);
    }

    usage = usage.plus(upper - tier.lowerBound);
    remaining = remaining.minus(bandCost);
  }

  return roundUsage(usage);
}

/**
 * Price a quantity through the ladder, in cents.
 */
export function ladderCostOf(usage: number, tiers: LadderTier[]): number | null {
  const ordered = sortTiers(tiers);
  if (ordered.length === 0) {
    return null;
  }

  let remaining = new Decimal(Math.max(0, usage));
  let cost = new Decimal(0);

  for (let i = 0; i < ordered.length && remaining.gt(0); i++) {
    const tier = ordered[i];
    const upper = effectiveUpperBound(tier, i === ordered.length - 1);
    const width = Number.isFinite(upper) ? new Decimal(upper - tier.lowerBound) : remaining;
    const billed = Decimal.min(width, remaining);
    cost = cost.plus(billed.mul(tier.unitPriceCents));
    remaining = remaining.minus(billed);
  }

  return cost.toDecimalPlaces(0, Decimal.ROUND_HALF_UP).toNumber();
}

/**
 * Relative divergence between a reported quantity priced through the ladder
 * and the cost derived from balances. Null when there is nothing to compare.
 */
export function checkDivergence(
  reportedUsage: number,
  computedCostCents: number,
  tiers: LadderTier[]
): number | null {
  const expectedCostCents = ladderCostOf(reportedUsage, tiers);
  if (expectedCostCents === null) {
    return null;
  }

  return relativeDivergence(expectedCostCents, computedCostCents);
}

/**
 * |a - b| relative to the larger of the two; 0 when both are 0.
 */
export function relativeDivergence(a: number, b: number): number {
  const scale = Math.max(Math.abs(a), Math.abs(b));
  if (scale === 0) {
    return 0;
  }
  return Math.abs(a - b) / scale;
}
