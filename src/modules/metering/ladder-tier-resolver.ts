import { AppError } from '../../common/errors/app-error.js';
import type { ActiveTier, LadderTier } from './types.js';

export function sortTiers(tiers: LadderTier[]): LadderTier[] {
  return [...tiers].sort((a, b) => a.index - b.index);
}

/**
 * The last tier is open-ended when its declared upper bound is absent or
 * non-positive. A missing bound on an inner tier is treated the same way.
 */
export function effectiveUpperBound(tier: LadderTier, isLast: boolean): number {
  if (tier.upperBound === null) {
    return Infinity;
  }
  if (isLast && tier.upperBound <= 0) {
    return Infinity;
  }
  return tier.upperBound;
}

/**
 * Active price band for a cumulative usage within the billing cycle.
 * Usage no band contains falls into the last band.
 */
export function resolveTier(cumulativeUsage: number, tiers: LadderTier[]): LadderTier {
  const ordered = sortTiers(tiers);
  if (ordered.length === 0) {
    throw AppError.noApplicableTier();
  }

  for (let i = 0; i < ordered.length; i++) {
    const tier = ordered[i];
    const upper = effectiveUpperBound(tier, i === ordered.length - 1);
    if (cumulativeUsage >= tier.lowerBound && cumulativeUsage < upper) {
      return tier;
    }
  }

  return ordered[ordered.length - 1];
}

export function toActiveTier(tier: LadderTier, fallbackDescription: string | null): ActiveTier {
  return {
    index: tier.index,
    unitPriceCents: tier.unitPriceCents,
    description: tier.cycleDescription || fallbackDescription || '',
  };
}

/**
 * Opaque identity of the current ladder cycle. The description text is
 * compared as a whole and never parsed for a boundary day.
 */
export function cycleKeyOf(cycleDescription: string | null, tiers: LadderTier[]): string | null {
  const fromSnapshot = cycleDescription?.trim();
  if (fromSnapshot) {
    return fromSnapshot;
  }
  const fromTiers = sortTiers(tiers)
    .map((tier) => tier.cycleDescription.trim())
    .find((description) => description.length > 0);
  return fromTiers ?? null;
}
