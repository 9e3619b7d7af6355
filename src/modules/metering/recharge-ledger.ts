import { AppError, isAppError } from '../../common/errors/app-error.js';
import { compareDateKeys, formatLocal, localDateKey, normalize } from './time-normalizer.js';
import type { DailyUsageRecord, RawRechargeEvent, RechargeEvent } from './types.js';

export interface RejectedRecharge {
  orderId: string;
  createdAtRaw: string;
  reason: string;
}

export interface NormalizedRecharges {
  events: RechargeEvent[];
  rejected: RejectedRecharge[];
}

export interface AbsorbResult {
  newEvents: RechargeEvent[];
  updatedKnownIds: Map<string, string>;
}

function byTimeThenId(a: RechargeEvent, b: RechargeEvent): number {
  if (a.createdAt !== b.createdAt) {
    return a.createdAt - b.createdAt;
  }
  return a.orderId < b.orderId ? -1 : a.orderId > b.orderId ? 1 : 0;
}

/**
 * Normalize recharge timestamps. An event whose time cannot be read is
 * rejected on its own; it is never counted and never marked as known.
 */
export function normalizeRechargeEvents(
  raw: RawRechargeEvent[],
  localOffsetHours: number
): NormalizedRecharges {
  const events: RechargeEvent[] = [];
  const rejected: RejectedRecharge[] = [];

  for (const event of raw) {
    const orderId = event.orderId.trim();
    if (!orderId) {
      rejected.push({ orderId: event.orderId, createdAtRaw: event.createdAtRaw, reason: 'missing order id' });
      continue;
    }

    try {
      const createdAt = normalize(event.createdAtRaw, localOffsetHours);
      events.push({
        ...event,
        orderId,
        createdAt,
        createdAtLocal: formatLocal(createdAt),
      });
    } catch (error) {
      if (!isAppError(error)) {
        throw error;
      }
      rejected.push({ orderId, createdAtRaw: event.createdAtRaw, reason: error.message });
    }
  }

  return { events, rejected };
}

/**
 * Drop recharges whose order id has already been seen and return the rest in
 * ascending time order. The same id twice in one batch is one transaction;
 * the earliest occurrence wins. Amount drift between polls is ignored.
 */
export function absorb(
  events: RechargeEvent[],
  knownIds: ReadonlyMap<string, string>
): AbsorbResult {
  const updatedKnownIds = new Map(knownIds);
  const newEvents: RechargeEvent[] = [];

  for (const event of [...events].sort(byTimeThenId)) {
    if (updatedKnownIds.has(event.orderId)) {
      continue;
    }
    updatedKnownIds.set(event.orderId, localDateKey(event.createdAt));
    newEvents.push(event);
  }

  return { newEvents, updatedKnownIds };
}

/**
 * Sum of recharges at or after a baseline instant (local wall-clock ms).
 */
export function rechargeTotalSince(events: RechargeEvent[], sinceWallMs: number): number {
  return events
    .filter((event) => event.createdAt >= sinceWallMs)
    .reduce((sum, event) => sum + event.amountCents, 0);
}

export interface RechargePruneOptions {
  cutoffDate: string;      // Ids dated strictly before this are eligible
  monthStartDate: string;  // Ids referenced on or after this date are kept
}

/**
 * Age-based pruning of the dedup set. An id still referenced by a daily
 * record of the current accounting period is never removed.
 */
export function pruneKnownRecharges(
  knownIds: ReadonlyMap<string, string>,
  history: ReadonlyMap<string, DailyUsageRecord>,
  options: RechargePruneOptions
): Map<string, string> {
  if (compareDateKeys(options.cutoffDate, options.monthStartDate) > 0) {
    throw AppError.invalidState('Recharge prune cutoff must not be after the month start', {
      cutoffDate: options.cutoffDate,
      monthStartDate: options.monthStartDate,
    });
  }

  const referenced = new Set<string>();
  for (const record of history.values()) {
    if (compareDateKeys(record.date, options.monthStartDate) >= 0) {
      record.rechargeIds.forEach((id) => referenced.add(id));
    }
  }

  const pruned = new Map<string, string>();
  for (const [id, date] of knownIds) {
    if (compareDateKeys(date, options.cutoffDate) >= 0 || referenced.has(id)) {
      pruned.set(id, date);
    }
  }
  return pruned;
}
