import { Router } from 'express';

import type { AppContext } from '../app.context.js';
import { createPreferencesRouter } from '../modules/preferences/preferences.router.js';
import { healthRouter } from './health.js';

export function createApiRouter(context: AppContext): Router {
  const router = Router();

  router.use('/health', healthRouter);
  router.use('/status', context.status.router);
  router.use('/config', createPreferencesRouter(context.preferences, context.dashboard.render));
  router.use('/debug', context.ble.debugRouter);

  return router;
}
