import { updateDisplayPreferencesSchema } from '@vampgotchi/common';
import { Router } from 'express';

import { validateRequest } from '../../shared/http/validate-request.js';
import { createPreferencesController } from './preferences.controller.js';
import type { PreferencesService } from './preferences.service.js';

export const createPreferencesRouter = (preferencesService: PreferencesService, renderPage: (notice?: string) => string) => {
  const router = Router();
  const controller = createPreferencesController(preferencesService, renderPage);

  router.get('/', controller.get);
  router.post('/', validateRequest({ body: updateDisplayPreferencesSchema }), controller.update);

  return router;
};
