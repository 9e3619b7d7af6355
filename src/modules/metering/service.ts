import { nanoid } from 'nanoid';
import { env } from '../../config/env.js';
import { AppError } from '../../common/errors/app-error.js';
import { meteringLogger, storeLogger, type Logger } from '../../common/logger.js';
import { listHistory, rollingStats, validateRange } from './daily-history.js';
import { reconcileSnapshot } from './engine.js';
import { HistoryStore } from './history-store.js';
import {
  DEFAULT_ENGINE_CONFIG,
  type AccountProjection,
  type DailyUsageRecord,
  type DateRange,
  type EngineConfig,
  type PersistedState,
  type ReconciliationResult,
  type RollingStats,
  type SnapshotOutcome,
  type SnapshotSource,
} from './types.js';

export interface HistoryView {
  entryId: string;
  range: DateRange;
  stats: RollingStats;
  records: DailyUsageRecord[];
}

/**
 * Reconciliation Service
 *
 * Owns the per-entry lifecycle around the pure engine:
 * - loads state once and caches it per entry
 * - runs at most one cycle per entry at a time (later calls queue)
 * - persists before publishing, so a failed cycle leaves the previous state
 * - keeps the last projection for the presentation layer
 */
export class ReconciliationService {
  private readonly config: EngineConfig;
  private readonly states = new Map<string, PersistedState>();
  private readonly projections = new Map<string, AccountProjection>();
  private readonly queues = new Map<string, Promise<unknown>>();
  private readonly sources = new Map<string, SnapshotSource>();

  constructor(
    private readonly store: HistoryStore,
    config: Partial<EngineConfig> = {},
    private readonly logger: Logger = meteringLogger
  ) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...config };
  }

  // ============================================================================
  // Cycles
  // ============================================================================

  /**
   * Run one reconciliation cycle for an entry. An upstream failure is
   * reported back unchanged and leaves the state as it was.
   */
  async runCycle(entryId: string, outcome: SnapshotOutcome): Promise<ReconciliationResult> {
    return this.withEntryLock(entryId, async () => {
      const cycleId = nanoid();

      if (!outcome.ok) {
        this.logger.warn(
          { entryId, cycleId, code: outcome.failure.code, err: outcome.failure },
          'Upstream failure; state left untouched'
        );
        return {
          cycleId,
          entryId,
          status: 'failed',
          projection: this.projections.get(entryId) ?? null,
          newRecharges: [],
          rawTodayCostCents: null,
          rawMonthCostCents: null,
          cycleRolledOver: false,
          warnings: [],
          failure: outcome.failure,
        };
      }

      const previous = await this.getState(entryId);
      const { state, result } = reconcileSnapshot({
        cycleId,
        state: previous,
        snapshot: outcome.snapshot,
        config: this.config,
        logger: this.logger.child({ entryId, cycleId }),
      });

      await this.store.save(state);

      this.states.set(entryId, state);
      if (result.projection) {
        this.projections.set(entryId, result.projection);
      }

      this.logger.info(
        {
          entryId,
          cycleId,
          status: result.status,
          todayCostCents: result.projection?.today.costCents,
          monthCostCents: result.projection?.month.costCents,
          warnings: result.warnings.length,
        },
        'Reconciliation cycle completed'
      );

      return result;
    });
  }

  /**
   * Fetch from the entry's registered source and reconcile.
   */
  async refresh(entryId: string): Promise<ReconciliationResult> {
    const source = this.sources.get(entryId);
    if (!source) {
      throw AppError.notFound(`Snapshot source for entry ${entryId}`);
    }
    return this.runCycle(entryId, await source.fetchSnapshot());
  }

  registerSource(entryId: string, source: SnapshotSource): void {
    this.sources.set(entryId, source);
  }

  hasEntry(entryId: string): boolean {
    return this.sources.has(entryId) || this.states.has(entryId);
  }

  // ============================================================================
  // Reads
  // ============================================================================

  getProjection(entryId: string): AccountProjection | null {
    return this.projections.get(entryId) ?? null;
  }

  async getHistory(entryId: string, range: DateRange = {}): Promise<HistoryView> {
    validateRange(range);
    const state = await this.getState(entryId);
    return {
      entryId,
      range,
      stats: rollingStats(state, range),
      records: listHistory(state, range),
    };
  }

  async getState(entryId: string): Promise<PersistedState> {
    const cached = this.states.get(entryId);
    if (cached) {
      return cached;
    }

    const { state, status } = await this.store.load(entryId);
    if (status !== 'loaded') {
      this.logger.info({ entryId, status }, 'Starting entry without a baseline');
    }
    this.states.set(entryId, state);
    return state;
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Forget an entry's persisted state. The next cycle starts a new baseline.
   */
  async resetEntry(entryId: string): Promise<boolean> {
    return this.withEntryLock(entryId, async () => {
      const removed = await this.store.remove(entryId);
      this.states.delete(entryId);
      this.projections.delete(entryId);
      this.logger.warn({ entryId, removed }, 'Entry state reset');
      return removed;
    });
  }

  /**
   * Serialize work per entry: each call waits for the previous one to settle.
   */
  private async withEntryLock<T>(entryId: string, work: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(entryId) ?? Promise.resolve();
    const current = previous.then(work, work);
    const settled = current.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(entryId, settled);

    try {
      return await current;
    } finally {
      if (this.queues.get(entryId) === settled) {
        this.queues.delete(entryId);
      }
    }
  }
}

// Singleton instance
let reconciliationServiceInstance: ReconciliationService | null = null;

export function getReconciliationService(): ReconciliationService {
  if (!reconciliationServiceInstance) {
    reconciliationServiceInstance = new ReconciliationService(
      new HistoryStore({ dataDir: env.DATA_DIR, logger: storeLogger }),
      {
        localOffsetHours: env.LOCAL_UTC_OFFSET_HOURS,
        historyRetentionDays: env.HISTORY_RETENTION_DAYS,
        rechargeIdRetentionDays: env.RECHARGE_ID_RETENTION_DAYS,
        usageDivergenceTolerance: env.USAGE_DIVERGENCE_TOLERANCE,
      }
    );
  }
  return reconciliationServiceInstance;
}
