import * as cron from 'node-cron';

import { logger } from '../logger/index.js';
import type { DisplayService } from '../../modules/display/display.service.js';

export class DisplayRefreshScheduler {
  private task: ReturnType<typeof cron.schedule> | null = null;

  constructor(private readonly displayService: DisplayService) {}

  /**
   * Start refreshing the panel.
   * Default: every 3 seconds
   */
  start(cronExpression = '*/3 * * * * *'): void {
    if (this.task) {
      logger.warn('Display refresh scheduler is already running');
      return;
    }
    if (!cron.validate(cronExpression)) {
      throw new Error(`Invalid display refresh schedule: ${cronExpression}`);
    }

    logger.info({ cronExpression }, 'Starting display refresh scheduler');

    // Overlapping ticks join the refresh already in flight.
    this.task = cron.schedule(cronExpression, async () => {
      try {
        await this.displayService.refresh();
      } catch (error) {
        logger.error({ err: error }, 'Error in display refresh scheduler');
      }
    });
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('Display refresh scheduler stopped');
    }
  }
}
