import { err, ok } from '@vampgotchi/common';
import { describe, expect, it, vi } from 'vitest';

import type { CommandRunner } from '../../shared/system/command-runner.js';
import type { BleTool, BleToolResult } from '../ble/ble-tool.js';
import { BleService } from '../ble/ble.service.js';
import { NetworkService } from '../network/network.service.js';
import { InMemoryPreferencesRepository } from '../preferences/preferences.repository.memory.js';
import { PreferencesService } from '../preferences/preferences.service.js';
import { SessionStore } from '../session/session.store.js';
import { StatusService } from '../status/status.service.js';
import { TargetRegistry } from '../targets/target.registry.js';
import { createDisplayModule } from './display.module.js';
import type { PanelDriver } from './display.panel.js';

class CountingPanel implements PanelDriver {
  readonly name = 'counting';
  draws = 0;

  async init(): Promise<void> {}

  async display(): Promise<void> {
    this.draws += 1;
  }

  async sleep(): Promise<void> {}
}

const runner: CommandRunner = {
  run: async () => ok({ stdout: '', stderr: '' }),
};

const tool: BleTool = {
  scan: async () => ok('Device: ring AA:BB:CC:DD:EE:FF RSSI: -50\n'),
  deauth: (_mac, _timeout, signal) =>
    new Promise<BleToolResult>((resolve) => {
      signal.addEventListener('abort', () =>
        resolve(err({ kind: 'aborted', exitCode: null, message: 'aborted', stdout: '', stderr: '' })),
      );
    }),
  adapterStatus: async () => ok(''),
};

const setup = () => {
  const session = new SessionStore();
  const registry = new TargetRegistry();
  const preferences = new PreferencesService(new InMemoryPreferencesRepository());
  const network = new NetworkService({
    runner,
    preferences,
    paths: { hostapd: 'unused', dnsmasq: 'unused', dhcpcd: 'unused', wpaSupplicant: 'unused' },
    interfaceName: 'wlan0',
    country: 'US',
    interfaces: () => ({}),
  });
  const status = new StatusService(session, registry, network);
  const ble = new BleService(tool, session, registry, preferences);
  const panel = new CountingPanel();
  const { service } = createDisplayModule({ session, status, preferences, ble, panel });
  return { ble, panel, service };
};

describe('createDisplayModule', () => {
  it('redraws when a scan starts without waiting for the schedule', async () => {
    const { ble, panel } = setup();

    ble.startScan();

    await vi.waitFor(() => expect(panel.draws).toBeGreaterThanOrEqual(1));
  });

  it('redraws when an attack starts and again when it is stopped', async () => {
    const { ble, panel } = setup();

    await ble.startAttack('AA:BB:CC:DD:EE:FF');
    await vi.waitFor(() => expect(panel.draws).toBe(1));

    await ble.stopAttack();
    await vi.waitFor(() => expect(panel.draws).toBe(2));
  });
});
