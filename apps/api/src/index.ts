import { createServer } from 'http';

import type { Preferences } from '@vampgotchi/common';

import { createApp } from './app.js';
import { createAppContext } from './app.context.js';
import { env } from './config/env.js';
import { logger } from './core/logger/index.js';
import { AutoScanScheduler } from './core/scheduler/auto-scan-scheduler.js';
import { DisplayRefreshScheduler } from './core/scheduler/display-refresh-scheduler.js';

async function startServer() {
  const context = await createAppContext();
  const app = createApp(context);
  const server = createServer(app);

  const displayScheduler = new DisplayRefreshScheduler(context.display.service);
  const autoScanScheduler = new AutoScanScheduler(context.ble.service);

  server.on('error', (error: NodeJS.ErrnoException) => {
    if (error.code === 'EACCES') {
      logger.fatal({ port: env.PORT }, 'Permission denied binding the HTTP port; ports below 1024 need root');
    } else {
      logger.fatal({ err: error }, 'HTTP server error');
    }
    process.exit(1);
  });

  server.listen(env.PORT, env.HOST, () => {
    logger.info({ host: env.HOST, port: env.PORT }, 'VampGotchi server started');
    displayScheduler.start(env.DISPLAY_REFRESH_CRON);
    autoScanScheduler.start(context.preferences.get().scanInterval);
    void context.display.service.refresh();
  });

  let scanInterval = context.preferences.get().scanInterval;
  context.preferences.on('change', (preferences: Preferences) => {
    if (preferences.scanInterval === scanInterval) return;
    scanInterval = preferences.scanInterval;
    autoScanScheduler.restart(scanInterval);
  });

  return { server, context, schedulers: [displayScheduler, autoScanScheduler] };
}

const { server, context, schedulers } = await startServer();

const shutdown = async (signal: NodeJS.Signals) => {
  logger.info({ signal }, 'Received shutdown signal');

  schedulers.forEach((scheduler) => scheduler.stop());
  await context.ble.service.stopAttack();
  await context.display.service.shutdown();

  server.close((err?: Error) => {
    if (err) {
      logger.error({ err }, 'Error during server shutdown');
      process.exitCode = 1;
    }
    logger.info('Server closed');
    process.exit();
  });
};

(['SIGINT', 'SIGTERM'] as const).forEach((signal) => {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
  });
});
