import { err, ok } from '@vampgotchi/common';
import { describe, expect, it, vi } from 'vitest';

import type { CommandFailure } from '../../shared/system/command-runner.js';
import { InMemoryPreferencesRepository } from '../preferences/preferences.repository.memory.js';
import { PreferencesService } from '../preferences/preferences.service.js';
import { SessionStore } from '../session/session.store.js';
import { TargetRegistry } from '../targets/target.registry.js';
import type { BleTool, BleToolResult } from './ble-tool.js';
import { BleService } from './ble.service.js';

const failure = (kind: CommandFailure['kind']): CommandFailure => ({
  kind,
  exitCode: kind === 'exit' ? 1 : null,
  message: `${kind} failure`,
  stdout: '',
  stderr: 'boom',
});

/** Deauth runs stay pending until aborted or finished by the test. */
class FakeBleTool implements BleTool {
  scanResult: BleToolResult = ok('');
  scanError: Error | null = null;
  deauthCalls: Array<{ mac: string; timeoutSeconds: number }> = [];
  private pending: Array<(result: BleToolResult) => void> = [];

  async scan(): Promise<BleToolResult> {
    if (this.scanError) throw this.scanError;
    return this.scanResult;
  }

  deauth(mac: string, timeoutSeconds: number, signal: AbortSignal): Promise<BleToolResult> {
    this.deauthCalls.push({ mac, timeoutSeconds });
    return new Promise((resolve) => {
      this.pending.push(resolve);
      signal.addEventListener('abort', () => resolve(err(failure('aborted'))));
    });
  }

  async adapterStatus(): Promise<BleToolResult> {
    return ok('hci0: UP RUNNING');
  }

  finishAttack(result: BleToolResult) {
    const resolve = this.pending.shift();
    resolve?.(result);
  }
}

const setup = () => {
  const tool = new FakeBleTool();
  const session = new SessionStore();
  const registry = new TargetRegistry();
  const preferences = new PreferencesService(new InMemoryPreferencesRepository());
  const service = new BleService(tool, session, registry, preferences);
  return { tool, session, registry, preferences, service };
};

describe('BleService scans', () => {
  it('records parsed devices and becomes happy', async () => {
    const { tool, session, registry, service } = setup();
    tool.scanResult = ok('Device: ring-01 AA:BB:CC:DD:EE:FF RSSI: -42\nnoise line\n');

    expect(service.startScan()).toBe('started');
    expect(session.snapshot().scanStatus).toBe('Scanning');
    await service.waitForScan();

    const snapshot = session.snapshot();
    expect(snapshot.scanStatus).toBe('Done');
    expect(snapshot.mood).toBe('happy');
    expect(snapshot.counters).toEqual({ totalScans: 1, totalAttacks: 0, uniqueTargets: 1 });
    expect(registry.latestTargets()).toEqual(['AA:BB:CC:DD:EE:FF']);
    expect(registry.get('AA:BB:CC:DD:EE:FF')).toMatchObject({ name: 'ring-01', rssi: -42 });
    expect(service.getLastScan().output).toContain('ring-01');
  });

  it('finishes as Done and sad when nothing is found', async () => {
    const { tool, session, service } = setup();
    tool.scanResult = ok('Scanning...\nNo devices\n');

    service.startScan();
    await service.waitForScan();

    expect(session.snapshot().scanStatus).toBe('Done');
    expect(session.snapshot().mood).toBe('sad');
  });

  it.each(['exit', 'timeout', 'spawn'] as const)('sets Error and sad when the tool fails with %s', async (kind) => {
    const { tool, session, service } = setup();
    tool.scanResult = err(failure(kind));

    service.startScan();
    await service.waitForScan();

    expect(session.snapshot().scanStatus).toBe('Error');
    expect(session.snapshot().mood).toBe('sad');
    expect(service.getLastScan().output).toBe('boom');
  });

  it('does not reject when the tool throws', async () => {
    const { tool, session, service } = setup();
    tool.scanError = new Error('cannot spawn');

    service.startScan();
    await expect(service.waitForScan()).resolves.toBeUndefined();
    expect(session.snapshot().scanStatus).toBe('Error');
  });

  it('refuses a second scan while one is running', async () => {
    const { tool, service } = setup();
    const scan = vi.spyOn(tool, 'scan');

    expect(service.startScan()).toBe('started');
    expect(service.startScan()).toBe('busy');
    await service.waitForScan();

    expect(scan).toHaveBeenCalledTimes(1);
  });

  it('skips scheduled scans during an attack', async () => {
    const { service } = setup();
    await service.startAttack('AA:BB:CC:DD:EE:FF');

    await expect(service.runScheduledScan()).resolves.toBe(false);
    await service.stopAttack();
  });
});

describe('BleService attacks', () => {
  it('runs the tool with the configured timeout', async () => {
    const { tool, session, preferences, service } = setup();
    await preferences.update({ attackTimeout: 25 });

    await service.startAttack('AA:BB:CC:DD:EE:FF');

    expect(tool.deauthCalls).toEqual([{ mac: 'AA:BB:CC:DD:EE:FF', timeoutSeconds: 25 }]);
    expect(session.snapshot()).toMatchObject({ attacking: true, mood: 'angry', selectedTarget: 'AA:BB:CC:DD:EE:FF' });
    expect(service.currentAttack()).toBe('AA:BB:CC:DD:EE:FF');
  });

  it('ends as bored after completing with no targets', async () => {
    const { tool, session, service } = setup();
    await service.startAttack('AA:BB:CC:DD:EE:FF');

    tool.finishAttack(ok('done'));
    await vi.waitFor(() => expect(session.isAttacking()).toBe(false));

    expect(session.snapshot().mood).toBe('bored');
    expect(session.snapshot().pet.activity.at(-1)).toBe('> Attack completed!');
    expect(service.currentAttack()).toBeNull();
  });

  it('ends as happy after completing when targets are known', async () => {
    const { tool, session, registry, service } = setup();
    registry.recordScan([{ mac: '11:22:33:44:55:66', name: 'tag', rssi: -70 }]);
    await service.startAttack('11:22:33:44:55:66');

    tool.finishAttack(ok(''));
    await vi.waitFor(() => expect(session.isAttacking()).toBe(false));

    expect(session.snapshot().mood).toBe('happy');
  });

  it('becomes sad when the tool fails', async () => {
    const { tool, session, service } = setup();
    await service.startAttack('AA:BB:CC:DD:EE:FF');

    tool.finishAttack(err(failure('exit')));
    await vi.waitFor(() => expect(session.isAttacking()).toBe(false));

    expect(session.snapshot().mood).toBe('sad');
    expect(session.snapshot().pet.activity.at(-1)).toBe('> Attack failed!');
  });

  it('stops the running attack', async () => {
    const { session, service } = setup();
    await service.startAttack('AA:BB:CC:DD:EE:FF');

    await expect(service.stopAttack()).resolves.toBe(true);

    expect(session.isAttacking()).toBe(false);
    expect(session.snapshot().pet.activity.at(-1)).toBe('> Attack stopped!');
    expect(service.currentAttack()).toBeNull();
  });

  it('treats stop without an attack as a no-op', async () => {
    const { session, service } = setup();

    await expect(service.stopAttack()).resolves.toBe(false);
    expect(session.snapshot().pet.activity).toEqual([]);
  });

  it('replaces the running attack so only one is in progress', async () => {
    const { tool, session, service } = setup();

    await Promise.all([service.startAttack('AA:AA:AA:AA:AA:AA'), service.startAttack('BB:BB:BB:BB:BB:BB')]);

    expect(tool.deauthCalls.map((call) => call.mac)).toEqual(['AA:AA:AA:AA:AA:AA', 'BB:BB:BB:BB:BB:BB']);
    expect(service.currentAttack()).toBe('BB:BB:BB:BB:BB:BB');
    expect(session.snapshot()).toMatchObject({ attacking: true, selectedTarget: 'BB:BB:BB:BB:BB:BB' });
    expect(session.snapshot().counters.totalAttacks).toBe(2);
  });
});

describe('BleService activity events', () => {
  it('announces when scans and attacks start and end', async () => {
    const { service } = setup();
    const activity: string[] = [];
    service.on('activity', (event: string) => activity.push(event));

    service.startScan();
    await service.waitForScan();
    await service.startAttack('AA:BB:CC:DD:EE:FF');
    await service.stopAttack();

    expect(activity).toEqual(['scan-started', 'scan-finished', 'attack-started', 'attack-finished']);
  });
});

describe('BleService adapter status', () => {
  it('returns the tool output', async () => {
    const { service } = setup();
    await expect(service.adapterStatus()).resolves.toBe('hci0: UP RUNNING');
  });
});
