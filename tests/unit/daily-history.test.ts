import { describe, it, expect } from 'vitest';
import { AppError } from '../../src/common/errors/app-error.js';
import {
  createEmptyState,
  getRecord,
  listHistory,
  pruneHistory,
  rollingStats,
  totalHistoricalUsage,
  upsertToday,
  validateRange,
} from '../../src/modules/metering/daily-history.js';
import type { DailyUsageRecord, PersistedState } from '../../src/modules/metering/types.js';
import { dailyRecord } from '../helpers.js';

function stateWith(...usages: Array<[string, number]>): PersistedState {
  const state = createEmptyState('entry-1');
  return {
    ...state,
    dailyHistory: new Map(usages.map(([date, usage]): [string, DailyUsageRecord] => [date, dailyRecord(date, { usage })])),
  };
}

describe('DailyHistory', () => {
  describe('createEmptyState', () => {
    it('should start uninitialized with nothing recorded', () => {
      const state = createEmptyState('entry-1');

      expect(state.phase).toBe('uninitialized');
      expect(state.lastPollAt).toBeNull();
      expect(state.dailyHistory.size).toBe(0);
      expect(state.knownRechargeIds.size).toBe(0);
    });
  });

  describe('upsertToday', () => {
    it('should insert and then replace today\'s record', () => {
      const empty = createEmptyState('entry-1');

      const first = upsertToday(empty, dailyRecord('2026-01-31', { usage: 1 }), '2026-01-31');
      const second = upsertToday(first, dailyRecord('2026-01-31', { usage: 2.5 }), '2026-01-31');

      expect(getRecord(second, '2026-01-31')?.usage).toBe(2.5);
      expect(getRecord(first, '2026-01-31')?.usage).toBe(1);
      expect(empty.dailyHistory.size).toBe(0);
    });

    it('should refuse to write any other day', () => {
      const state = stateWith(['2026-01-30', 1]);

      expect(() => upsertToday(state, dailyRecord('2026-01-30', { usage: 9 }), '2026-01-31')).toThrow(AppError);
      expect(() => upsertToday(state, dailyRecord('2026-02-01'), '2026-01-31')).toThrow(/Only today's record/);
    });

    it('should refuse negative values', () => {
      const state = createEmptyState('entry-1');

      expect(() => upsertToday(state, dailyRecord('2026-01-31', { usage: -1 }), '2026-01-31')).toThrow(
        /must not be negative/
      );
      expect(() => upsertToday(state, dailyRecord('2026-01-31', { costCents: -1 }), '2026-01-31')).toThrow(
        /must not be negative/
      );
    });
  });

  describe('listHistory', () => {
    it('should return records oldest first within the range', () => {
      const state = stateWith(['2026-01-03', 0.8], ['2026-01-01', 1.5], ['2026-01-02', 2.25]);

      expect(listHistory(state).map((record) => record.date)).toEqual(['2026-01-01', '2026-01-02', '2026-01-03']);
      expect(listHistory(state, { from: '2026-01-02' }).map((record) => record.date)).toEqual([
        '2026-01-02',
        '2026-01-03',
      ]);
      expect(listHistory(state, { to: '2026-01-01' }).map((record) => record.date)).toEqual(['2026-01-01']);
    });
  });

  describe('rollingStats', () => {
    it('should be all zeros over zero days', () => {
      expect(rollingStats(createEmptyState('entry-1'))).toEqual({
        totalDays: 0,
        average: 0,
        max: 0,
        min: 0,
        total: 0,
      });
    });

    it('should fold usage over the range', () => {
      const state = stateWith(['2026-01-01', 1.5], ['2026-01-02', 2.25], ['2026-01-03', 0.8]);

      expect(rollingStats(state)).toEqual({ totalDays: 3, average: 1.52, max: 2.25, min: 0.8, total: 4.55 });
      expect(rollingStats(state, { from: '2026-01-02' })).toEqual({
        totalDays: 2,
        average: 1.53,
        max: 2.25,
        min: 0.8,
        total: 3.05,
      });
      expect(totalHistoricalUsage(state)).toBe(4.55);
    });

    it('should be zero for a range with no records', () => {
      const state = stateWith(['2026-01-01', 1.5]);
      expect(rollingStats(state, { from: '2026-02-01' }).totalDays).toBe(0);
    });
  });

  describe('validateRange', () => {
    it('should accept open and closed ranges', () => {
      expect(() => validateRange({})).not.toThrow();
      expect(() => validateRange({ from: '2026-01-01', to: '2026-01-01' })).not.toThrow();
    });

    it('should reject malformed or inverted ranges', () => {
      expect(() => validateRange({ from: '2026/01/01' })).toThrow('from must be a YYYY-MM-DD date');
      expect(() => validateRange({ to: '2026-02-30' })).toThrow('to must be a YYYY-MM-DD date');
      expect(() => validateRange({ from: '2026-01-02', to: '2026-01-01' })).toThrow('from must not be after to');
    });
  });

  describe('pruneHistory', () => {
    it('should drop records strictly before the cutoff', () => {
      const state = stateWith(['2026-01-01', 1.5], ['2026-01-02', 2.25], ['2026-01-03', 0.8]);

      const pruned = pruneHistory(state, '2026-01-02');

      expect([...pruned.dailyHistory.keys()]).toEqual(['2026-01-02', '2026-01-03']);
      expect(state.dailyHistory.size).toBe(3);
    });
  });
});
