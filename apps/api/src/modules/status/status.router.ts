import { Router } from 'express';

import { createStatusController } from './status.controller.js';
import type { StatusService } from './status.service.js';

export const createStatusRouter = (statusService: StatusService) => {
  const router = Router();
  const controller = createStatusController(statusService);

  router.get('/', controller.getStatus);

  return router;
};
