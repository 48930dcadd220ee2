import { env } from '../../config/env.js';
import { logger } from '../../core/logger/index.js';
import type { BleActivity, BleService } from '../ble/ble.service.js';
import type { PreferencesService } from '../preferences/preferences.service.js';
import type { SessionStore } from '../session/session.store.js';
import type { StatusService } from '../status/status.service.js';
import { createPanelDriver, type PanelDriver } from './display.panel.js';
import { DisplayService } from './display.service.js';

export interface DisplayModuleDependencies {
  session: SessionStore;
  status: StatusService;
  preferences: PreferencesService;
  ble: BleService;
  panel?: PanelDriver | null;
}

export function createDisplayModule({ session, status, preferences, ble, panel }: DisplayModuleDependencies) {
  const service = new DisplayService({
    panel: panel === undefined ? createPanelDriver(env.DISPLAY_DRIVER, env.DISPLAY_FRAME_PATH) : panel,
    session,
    status,
    preferences,
  });

  preferences.on('change', () => {
    void service.refresh().then((outcome) => {
      logger.debug({ outcome }, 'Display refreshed after preferences change');
    });
  });

  ble.on('activity', (activity: BleActivity) => {
    void service.refresh().then((outcome) => {
      logger.debug({ activity, outcome }, 'Display refreshed after BLE activity');
    });
  });

  return { service };
}

export type DisplayModule = ReturnType<typeof createDisplayModule>;
