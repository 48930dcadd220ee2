import type { UpdateDisplayPreferences } from '@vampgotchi/common';
import type { Request, Response } from 'express';

import { asyncHandler } from '../../shared/http/async-handler.js';
import type { PreferencesService } from './preferences.service.js';

export const createPreferencesController = (preferencesService: PreferencesService, renderPage: (notice?: string) => string) => ({
  get: (_req: Request, res: Response) => {
    res.json(preferencesService.toPublic());
  },

  /** Form posts get the dashboard back; JSON clients get the public preferences. */
  update: asyncHandler(async (req: Request, res: Response) => {
    const patch: UpdateDisplayPreferences = req.body;
    const updated = await preferencesService.update(patch);

    if (req.accepts(['html', 'json']) === 'json') {
      res.json(preferencesService.toPublic(updated));
      return;
    }
    res.type('html').send(renderPage('Display settings saved'));
  }),
});
