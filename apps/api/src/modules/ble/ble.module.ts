import { env } from '../../config/env.js';
import type { CommandRunner } from '../../shared/system/command-runner.js';
import type { PreferencesService } from '../preferences/preferences.service.js';
import type { SessionStore } from '../session/session.store.js';
import type { TargetRegistry } from '../targets/target.registry.js';
import { BleedingCliTool, type BleTool } from './ble-tool.js';
import { createBleDebugRouter } from './ble.router.js';
import { BleService } from './ble.service.js';

export interface BleModuleDependencies {
  runner: CommandRunner;
  session: SessionStore;
  registry: TargetRegistry;
  preferences: PreferencesService;
  tool?: BleTool;
}

export function createBleModule({ runner, session, registry, preferences, tool }: BleModuleDependencies) {
  const bleTool =
    tool ??
    new BleedingCliTool(runner, {
      python: env.BLE_TOOL_PYTHON,
      script: env.BLE_TOOL_SCRIPT,
      toolPath: () => preferences.get().bleToolPath,
      scanTimeoutMs: env.BLE_SCAN_TIMEOUT_MS,
    });
  const service = new BleService(bleTool, session, registry, preferences);
  return { service, debugRouter: createBleDebugRouter(service) };
}

export type BleModule = ReturnType<typeof createBleModule>;
