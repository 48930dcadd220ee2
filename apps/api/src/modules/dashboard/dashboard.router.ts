import { clientModeSchema } from '@vampgotchi/common';
import { Router } from 'express';

import { validateRequest } from '../../shared/http/validate-request.js';
import { attackSchema } from '../ble/ble.schemas.js';
import { createDashboardController, type DashboardControllerDependencies } from './dashboard.controller.js';

export const createDashboardRouter = (dependencies: DashboardControllerDependencies) => {
  const router = Router();
  const controller = createDashboardController(dependencies);

  router.get('/', controller.index);
  router.post('/scan', controller.scan);
  router.post('/attack', validateRequest({ body: attackSchema }), controller.attack);
  router.post('/stop', controller.stop);
  router.post('/set_ap', controller.setAccessPoint);
  router.post('/set_client', validateRequest({ body: clientModeSchema }), controller.setClient);

  return router;
};
