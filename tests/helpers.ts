import pino from 'pino';
import type {
  AccountSnapshot,
  DailyUsageRecord,
  LadderTier,
  RawRechargeEvent,
} from '../src/modules/metering/types.js';

export const silentLogger = pino({ level: 'silent' });

/**
 * Logger that keeps every line it writes, parsed.
 */
export function capturingLogger() {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(line: string) {
        lines.push(JSON.parse(line));
      },
    }
  );
  return { logger, lines };
}

export function recharge(orderId: string, amountCents: number, createdAtRaw: string): RawRechargeEvent {
  return { orderId, amountCents, createdAtRaw };
}

// [0, 200) @ 3.00, [200, 400) @ 3.50, [400, ∞) @ 4.00
export function standardTiers(cycleDescription = 'cycle-2026'): LadderTier[] {
  return [
    { index: 1, lowerBound: 0, upperBound: 200, unitPriceCents: 300, cycleDescription },
    { index: 2, lowerBound: 200, upperBound: 400, unitPriceCents: 350, cycleDescription },
    { index: 3, lowerBound: 400, upperBound: 0, unitPriceCents: 400, cycleDescription },
  ];
}

export interface SnapshotFixture {
  at: string;  // UTC instant, ISO
  balanceCents: number;
  recharges?: RawRechargeEvent[];
  cycle?: string | null;
  tiers?: LadderTier[];
  unitPriceCents?: number;
  reported?: AccountSnapshot['reported'];
}

export function snapshot(fixture: SnapshotFixture): AccountSnapshot {
  const cycle = fixture.cycle === undefined ? 'cycle-2026' : fixture.cycle;
  const result: AccountSnapshot = {
    balanceCents: fixture.balanceCents,
    arrearsCents: 0,
    rechargeEvents: fixture.recharges ?? [],
    ladderTiers: fixture.tiers ?? standardTiers(cycle ?? ''),
    cycleDescription: cycle,
    fetchedAt: new Date(fixture.at),
  };
  if (fixture.unitPriceCents !== undefined) {
    result.unitPriceCents = fixture.unitPriceCents;
  }
  if (fixture.reported) {
    result.reported = fixture.reported;
  }
  return result;
}

export function dailyRecord(date: string, overrides: Partial<DailyUsageRecord> = {}): DailyUsageRecord {
  return {
    date,
    usage: 0,
    costCents: 0,
    startBalanceCents: 0,
    rechargeTotalCents: 0,
    startedAt: `${date}T00:00:00`,
    rechargeIds: [],
    clamped: false,
    updatedAt: `${date}T00:00:00`,
    ...overrides,
  };
}
