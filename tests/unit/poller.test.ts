import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import os from 'node:os';
import { HistoryStore } from '../../src/modules/metering/history-store.js';
import { ReconciliationService } from '../../src/modules/metering/service.js';
import type { ReconciliationResult } from '../../src/modules/metering/types.js';
import { SnapshotPoller } from '../../src/modules/scheduler/poller.js';
import { capturingLogger, silentLogger } from '../helpers.js';

function result(status: ReconciliationResult['status']): ReconciliationResult {
  return {
    cycleId: 'cycle-test',
    entryId: 'entry-1',
    status,
    projection: null,
    newRecharges: [],
    rawTodayCostCents: null,
    rawMonthCostCents: null,
    cycleRolledOver: false,
    warnings: [],
  };
}

describe('SnapshotPoller', () => {
  let service: ReconciliationService;

  beforeEach(() => {
    vi.useFakeTimers();
    service = new ReconciliationService(
      new HistoryStore({ dataDir: os.tmpdir(), logger: silentLogger }),
      {},
      silentLogger
    );
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('should refresh on start and then on every interval', async () => {
    const refresh = vi.spyOn(service, 'refresh').mockResolvedValue(result('reconciled'));
    const poller = new SnapshotPoller({ entryId: 'entry-1', intervalMinutes: 30, service, logger: silentLogger });

    poller.start();
    expect(refresh).toHaveBeenCalledTimes(1);
    expect(refresh).toHaveBeenCalledWith('entry-1');

    await vi.advanceTimersByTimeAsync(30 * 60 * 1000);
    expect(refresh).toHaveBeenCalledTimes(2);

    poller.stop();
    expect(poller.running).toBe(false);
    await vi.advanceTimersByTimeAsync(60 * 60 * 1000);
    expect(refresh).toHaveBeenCalledTimes(2);
  });

  it('should not overlap refreshes', async () => {
    let release: () => void = () => undefined;
    const pending = new Promise<ReconciliationResult>((resolve) => {
      release = () => resolve(result('reconciled'));
    });
    const refresh = vi.spyOn(service, 'refresh').mockReturnValue(pending);
    const poller = new SnapshotPoller({ entryId: 'entry-1', intervalMinutes: 30, service, logger: silentLogger });

    const first = poller.tick();
    const second = poller.tick();
    expect(refresh).toHaveBeenCalledTimes(1);

    release();
    await Promise.all([first, second]);

    await poller.tick();
    expect(refresh).toHaveBeenCalledTimes(2);
  });

  it('should log a thrown refresh and keep going', async () => {
    const { logger, lines } = capturingLogger();
    vi.spyOn(service, 'refresh').mockRejectedValue(new Error('boom'));
    const poller = new SnapshotPoller({ entryId: 'entry-1', intervalMinutes: 30, service, logger });

    await expect(poller.tick()).resolves.toBeUndefined();

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 50,
      entryId: 'entry-1',
      msg: 'Refresh cycle failed; keeping last known values',
    });
  });

  it('should warn when the upstream fetch failed', async () => {
    const { logger, lines } = capturingLogger();
    vi.spyOn(service, 'refresh').mockResolvedValue(result('failed'));
    const poller = new SnapshotPoller({ entryId: 'entry-1', intervalMinutes: 30, service, logger });

    await poller.tick();

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 40, msg: 'Refresh failed upstream; keeping last known values' });
  });
});
