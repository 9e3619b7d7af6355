import { pollerLogger, type Logger } from '../../common/logger.js';
import type { ReconciliationService } from '../metering/service.js';

export interface PollerOptions {
  entryId: string;
  intervalMinutes: number;
  service: ReconciliationService;
  logger?: Logger;
}

/**
 * Snapshot Poller
 *
 * Refreshes one account entry on a fixed interval. Runs once on start.
 * A tick that finds the previous one still running is skipped. Retrying a
 * failed fetch is left to the next tick.
 */
export class SnapshotPoller {
  private timer?: NodeJS.Timeout;
  private inFlight: Promise<void> | null = null;
  private readonly logger: Logger;

  constructor(private readonly options: PollerOptions) {
    this.logger = (options.logger ?? pollerLogger).child({ entryId: options.entryId });
  }

  start(): void {
    this.stop();

    this.logger.info({ intervalMinutes: this.options.intervalMinutes }, 'Starting snapshot poller');
    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.intervalMinutes * 60 * 1000);

    // Run once on boot
    void this.tick();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /**
   * Wait for the current tick, if any. Used on shutdown.
   */
  async drain(): Promise<void> {
    await this.inFlight;
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  tick(): Promise<void> {
    if (this.inFlight) {
      this.logger.debug('Previous refresh still running; skipping tick');
      return this.inFlight;
    }

    this.inFlight = this.refresh().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async refresh(): Promise<void> {
    try {
      const result = await this.options.service.refresh(this.options.entryId);
      if (result.status === 'failed') {
        this.logger.warn(
          { cycleId: result.cycleId, code: result.failure?.code },
          'Refresh failed upstream; keeping last known values'
        );
      }
    } catch (error) {
      this.logger.error({ err: error }, 'Refresh cycle failed; keeping last known values');
    }
  }
}
