import type { BleService } from '../ble/ble.service.js';
import type { NetworkService } from '../network/network.service.js';
import type { PreferencesService } from '../preferences/preferences.service.js';
import type { StatusService } from '../status/status.service.js';
import type { RenderPage } from './dashboard.controller.js';
import { createDashboardRouter } from './dashboard.router.js';
import { renderDashboard } from './dashboard.view.js';

export interface DashboardModuleDependencies {
  ble: BleService;
  network: NetworkService;
  status: StatusService;
  preferences: PreferencesService;
}

export function createDashboardModule({ ble, network, status, preferences }: DashboardModuleDependencies) {
  const render: RenderPage = (notice) =>
    renderDashboard({ status: status.getStatus(), preferences: preferences.toPublic(), notice });

  return { render, router: createDashboardRouter({ ble, network, render }) };
}

export type DashboardModule = ReturnType<typeof createDashboardModule>;
