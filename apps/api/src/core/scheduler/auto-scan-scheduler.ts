import * as cron from 'node-cron';

import { logger } from '../logger/index.js';
import { intervalToCronExpression } from './cron-expression.js';

export interface ScheduledScanner {
  runScheduledScan(): Promise<boolean>;
}

/**
 * Runs a scan every `scanInterval` seconds. Intervals that divide a cron field
 * evenly go through node-cron; any other interval is timed from the end of the
 * previous scan.
 */
export class AutoScanScheduler {
  private task: ReturnType<typeof cron.schedule> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private intervalMs: number | null = null;
  private running = false;

  constructor(private readonly scanner: ScheduledScanner) {}

  /** A zero interval leaves auto-scan off. */
  start(intervalSeconds: number): void {
    if (this.isRunning()) {
      logger.warn('Auto-scan scheduler is already running');
      return;
    }
    if (intervalSeconds <= 0) {
      logger.info('Auto-scan disabled');
      return;
    }

    const cronExpression = intervalToCronExpression(intervalSeconds);
    if (cronExpression === null) {
      logger.info({ intervalSeconds }, 'Starting auto-scan timer');
      this.intervalMs = intervalSeconds * 1000;
      this.arm();
      return;
    }

    logger.info({ intervalSeconds, cronExpression }, 'Starting auto-scan scheduler');
    this.task = cron.schedule(cronExpression, () => {
      void this.tick();
    });
  }

  stop(): void {
    if (!this.isRunning()) return;

    this.task?.stop();
    this.task = null;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.intervalMs = null;
    logger.info('Auto-scan scheduler stopped');
  }

  restart(intervalSeconds: number): void {
    this.stop();
    this.start(intervalSeconds);
  }

  isRunning(): boolean {
    return this.task !== null || this.intervalMs !== null;
  }

  /** Runs one scheduled scan unless the previous one is still going. */
  async tick(): Promise<void> {
    if (this.running) {
      logger.debug('Previous auto-scan still running, skipping tick');
      return;
    }

    this.running = true;
    try {
      await this.scanner.runScheduledScan();
    } catch (error) {
      logger.error({ err: error }, 'Error in auto-scan scheduler');
    } finally {
      this.running = false;
    }
  }

  private arm(): void {
    const intervalMs = this.intervalMs;
    if (intervalMs === null) return;

    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick().then(() => {
        // stop() or restart() may have run during the scan
        if (this.intervalMs === intervalMs && this.timer === null) this.arm();
      });
    }, intervalMs);
  }
}
