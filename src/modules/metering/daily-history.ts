import { Decimal } from 'decimal.js';
import { AppError } from '../../common/errors/app-error.js';
import { compareDateKeys, isDateKey } from './time-normalizer.js';
import type { DailyUsageRecord, DateRange, PersistedState, RollingStats } from './types.js';

// ============================================================================
// State Lifecycle
// ============================================================================

export function createEmptyState(entryId: string): PersistedState {
  return {
    entryId,
    phase: 'uninitialized',
    lastBalanceCents: 0,
    lastPollAt: null,
    knownRechargeIds: new Map(),
    dailyHistory: new Map(),
    monthBaselineBalanceCents: 0,
    monthBaselineAt: null,
    monthStartDate: null,
    monthRechargeTotalCents: 0,
    cycleKey: null,
  };
}

// ============================================================================
// Daily Records
// ============================================================================

/**
 * Insert or replace today's record. Any other date is write-once: a record
 * for a past day is never rewritten, and nothing is written ahead of today.
 */
export function upsertToday(
  state: PersistedState,
  record: DailyUsageRecord,
  today: string
): PersistedState {
  if (record.date !== today) {
    throw AppError.invalidState(`Only today's record (${today}) can be upserted`, {
      date: record.date,
    });
  }
  if (record.usage < 0 || record.costCents < 0) {
    throw AppError.invalidState('Daily usage and cost must not be negative', {
      date: record.date,
      usage: record.usage,
      costCents: record.costCents,
    });
  }

  const dailyHistory = new Map(state.dailyHistory);
  dailyHistory.set(record.date, record);
  return { ...state, dailyHistory };
}

export function getRecord(state: PersistedState, date: string): DailyUsageRecord | undefined {
  return state.dailyHistory.get(date);
}

function inRange(date: string, range: DateRange): boolean {
  if (range.from && compareDateKeys(date, range.from) < 0) {
    return false;
  }
  if (range.to && compareDateKeys(date, range.to) > 0) {
    return false;
  }
  return true;
}

export function validateRange(range: DateRange): void {
  for (const name of ['from', 'to'] as const) {
    const value = range[name];
    if (value !== undefined && !isDateKey(value)) {
      throw AppError.invalidRequest(`${name} must be a YYYY-MM-DD date`, { [name]: value });
    }
  }
  if (range.from && range.to && compareDateKeys(range.from, range.to) > 0) {
    throw AppError.invalidRequest('from must not be after to', { ...range });
  }
}

/**
 * Records in range, oldest first.
 */
export function listHistory(state: PersistedState, range: DateRange = {}): DailyUsageRecord[] {
  return [...state.dailyHistory.values()]
    .filter((record) => inRange(record.date, range))
    .sort((a, b) => compareDateKeys(a.date, b.date));
}

/**
 * Read-only fold over daily usage. Zero days yields all zeros.
 */
export function rollingStats(state: PersistedState, range: DateRange = {}): RollingStats {
  const usages = listHistory(state, range).map((record) => record.usage);

  if (usages.length === 0) {
    return { totalDays: 0, average: 0, max: 0, min: 0, total: 0 };
  }

  const total = usages.reduce((sum, usage) => sum.plus(usage), new Decimal(0));

  return {
    totalDays: usages.length,
    average: total.div(usages.length).toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber(),
    max: Math.max(...usages),
    min: Math.min(...usages),
    total: total.toDecimalPlaces(3, Decimal.ROUND_HALF_UP).toNumber(),
  };
}

/**
 * Drop records dated strictly before `beforeDate`.
 */
export function pruneHistory(state: PersistedState, beforeDate: string): PersistedState {
  const dailyHistory = new Map(
    [...state.dailyHistory].filter(([date]) => compareDateKeys(date, beforeDate) >= 0)
  );
  return { ...state, dailyHistory };
}

export function totalHistoricalUsage(state: PersistedState): number {
  return rollingStats(state).total;
}
