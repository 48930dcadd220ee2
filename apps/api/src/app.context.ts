import { createBleModule } from './modules/ble/ble.module.js';
import type { BleTool } from './modules/ble/ble-tool.js';
import { createDashboardModule } from './modules/dashboard/dashboard.module.js';
import { createDisplayModule } from './modules/display/display.module.js';
import type { PanelDriver } from './modules/display/display.panel.js';
import type { InterfaceTable } from './modules/network/network.detector.js';
import { createNetworkModule } from './modules/network/network.module.js';
import type { NetworkConfigPaths } from './modules/network/network.service.js';
import { createPreferencesModule } from './modules/preferences/preferences.module.js';
import type { PreferencesRepository } from './modules/preferences/preferences.repository.js';
import { SessionStore } from './modules/session/session.store.js';
import { createStatusModule } from './modules/status/status.module.js';
import { TargetRegistry } from './modules/targets/target.registry.js';
import { ExecFileCommandRunner, type CommandRunner } from './shared/system/command-runner.js';

/** Replacements for the parts that touch the host, used by tests. */
export interface AppContextOverrides {
  runner?: CommandRunner;
  bleTool?: BleTool;
  panel?: PanelDriver | null;
  preferencesRepository?: PreferencesRepository;
  interfaces?: () => InterfaceTable;
  networkPaths?: NetworkConfigPaths;
}

export async function createAppContext(overrides: AppContextOverrides = {}) {
  const runner = overrides.runner ?? new ExecFileCommandRunner();
  const { service: preferences } = await createPreferencesModule(overrides.preferencesRepository);
  const session = new SessionStore();
  const registry = new TargetRegistry();

  const network = createNetworkModule(runner, preferences, {
    paths: overrides.networkPaths,
    interfaces: overrides.interfaces,
  });
  const ble = createBleModule({ runner, session, registry, preferences, tool: overrides.bleTool });
  const status = createStatusModule(session, registry, network.service);
  const display = createDisplayModule({
    session,
    status: status.service,
    preferences,
    ble: ble.service,
    panel: overrides.panel,
  });
  const dashboard = createDashboardModule({
    ble: ble.service,
    network: network.service,
    status: status.service,
    preferences,
  });

  return { preferences, session, registry, network, ble, status, display, dashboard };
}

export type AppContext = Awaited<ReturnType<typeof createAppContext>>;
