import { Router } from 'express';

import { createBleController } from './ble.controller.js';
import type { BleService } from './ble.service.js';

export const createBleDebugRouter = (bleService: BleService) => {
  const router = Router();
  const controller = createBleController(bleService);

  router.get('/scan', controller.lastScan);
  router.get('/bluetooth', controller.bluetooth);

  return router;
};
