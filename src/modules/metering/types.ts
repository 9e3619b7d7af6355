import type { AppError, ErrorCode } from '../../common/errors/app-error.js';

// ============================================================================
// Snapshot Types (one per poll, never persisted)
// ============================================================================

export interface RawRechargeEvent {
  orderId: string;
  amountCents: number;
  createdAtRaw: string;  // UTC-offset bearing or bare local, as the upstream sends it
}

export interface RechargeEvent extends RawRechargeEvent {
  createdAt: number;       // Local wall-clock milliseconds
  createdAtLocal: string;  // YYYY-MM-DDTHH:mm:ss, local
}

export interface LadderTier {
  index: number;
  lowerBound: number;
  upperBound: number | null;  // null or <= 0 on the last tier means unbounded
  unitPriceCents: number;     // May be fractional (e.g. 287.5 for 2.875/unit)
  cycleDescription: string;
}

/**
 * Quantities the upstream reports directly. When present they are
 * authoritative; computed values are only cross-checked against them.
 */
export interface ReportedQuantities {
  monthUsage?: number;
  monthCostCents?: number;
  monthEstimateCostCents?: number;
  lastMonthBalanceCents?: number;
  todayUsage?: number;
  totalUsage?: number;
  availableDays?: number;
}

export interface AccountSnapshot {
  balanceCents: number;
  arrearsCents: number;
  rechargeEvents: RawRechargeEvent[];
  ladderTiers: LadderTier[];
  cycleDescription: string | null;
  unitPriceCents?: number;
  reported?: ReportedQuantities;
  fetchedAt: Date;
}

/**
 * What the transport collaborator hands the engine each cycle.
 * A failure is reported upward unchanged and never reconciled.
 */
export type SnapshotOutcome =
  | { ok: true; snapshot: AccountSnapshot }
  | { ok: false; failure: AppError };

export interface SnapshotSource {
  fetchSnapshot(): Promise<SnapshotOutcome>;
}

// ============================================================================
// Persisted Types
// ============================================================================

export interface DailyUsageRecord {
  date: string;               // YYYY-MM-DD, local
  usage: number;              // Never negative
  costCents: number;          // Never negative
  startBalanceCents: number;
  rechargeTotalCents: number;
  startedAt: string;          // Local instant the start balance was observed
  rechargeIds: string[];      // Recharges attributed to this day
  clamped: boolean;           // Raw cost was negative and clamped to zero
  updatedAt: string;
}

export type EntryPhase = 'uninitialized' | 'tracking';

export interface PersistedState {
  entryId: string;
  phase: EntryPhase;
  lastBalanceCents: number;
  lastPollAt: string | null;
  knownRechargeIds: Map<string, string>;  // orderId -> local date of the recharge
  dailyHistory: Map<string, DailyUsageRecord>;
  monthBaselineBalanceCents: number;
  monthBaselineAt: string | null;
  monthStartDate: string | null;
  monthRechargeTotalCents: number;
  cycleKey: string | null;
}

// ============================================================================
// Statistics & Projection
// ============================================================================

export interface DateRange {
  from?: string;  // inclusive
  to?: string;    // inclusive
}

export interface RollingStats {
  totalDays: number;
  average: number;
  max: number;
  min: number;
  total: number;
}

export interface ActiveTier {
  index: number;
  unitPriceCents: number;
  description: string;
}

export interface LadderSchedule {
  cycleDescription: string | null;
  totalTiers: number;
  tiers: LadderTier[];
}

/**
 * Read-only view handed to the presentation layer.
 */
export interface AccountProjection {
  entryId: string;
  balanceCents: number;
  arrearsCents: number;
  lastMonthBalanceCents: number | null;
  today: {
    date: string;
    usage: number;
    costCents: number;
    rechargeTotalCents: number;
  };
  month: {
    startDate: string;
    usage: number | null;
    costCents: number;              // Reported when the upstream sends it, else computed
    rawCostCents: number;           // Balance-derived, unclamped
    estimatedCostCents: number | null;
    rechargeTotalCents: number;
  };
  totalUsage: number;
  tier: ActiveTier | null;
  ladder: LadderSchedule;
  dailyStats: RollingStats;
  history: DailyUsageRecord[];
  availableDays: number | null;
  updatedAt: string;
}

// ============================================================================
// Cycle Types
// ============================================================================

export interface CycleWarning {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export type CycleStatus = 'initialized' | 'reconciled' | 'failed';

export interface ReconciliationResult {
  cycleId: string;
  entryId: string;
  status: CycleStatus;
  projection: AccountProjection | null;
  newRecharges: RechargeEvent[];
  rawTodayCostCents: number | null;
  rawMonthCostCents: number | null;
  cycleRolledOver: boolean;
  warnings: CycleWarning[];
  failure?: AppError;
}

export interface EngineConfig {
  localOffsetHours: number;
  historyRetentionDays: number;      // 0 keeps everything
  rechargeIdRetentionDays: number;   // 0 keeps everything
  usageDivergenceTolerance: number;  // Relative, e.g. 0.2 = 20%
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  localOffsetHours: 8,
  historyRetentionDays: 400,
  rechargeIdRetentionDays: 400,
  usageDivergenceTolerance: 0.2,
};
