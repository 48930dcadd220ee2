import { EventEmitter } from 'events';

import { logger } from '../../core/logger/index.js';
import { describeFailure } from '../../shared/system/command-runner.js';
import type { PreferencesService } from '../preferences/preferences.service.js';
import type { SessionStore } from '../session/session.store.js';
import { parseScanOutput } from '../targets/scan-output.parser.js';
import type { TargetRegistry } from '../targets/target.registry.js';
import type { BleTool, BleToolResult } from './ble-tool.js';

export type ScanStartResult = 'started' | 'busy';

export type BleActivity = 'scan-started' | 'scan-finished' | 'attack-started' | 'attack-finished';

export interface LastScan {
  output: string;
  finishedAt: string | null;
}

interface AttackHandle {
  mac: string;
  controller: AbortController;
  done: Promise<void>;
}

/**
 * Runs scans and attacks in the background and records their outcomes in the
 * session. Nothing here rejects to the caller: failures end up in state and logs.
 *
 * Attack transitions (start, stop) are chained so that a new attack only
 * launches after the previous one has been aborted and has settled.
 *
 * Emits `activity` with a {@link BleActivity} whenever a scan or an attack
 * starts or ends.
 */
export class BleService extends EventEmitter {
  private scanTask: Promise<void> | null = null;
  private attack: AttackHandle | null = null;
  private transitions: Promise<unknown> = Promise.resolve();
  private lastScan: LastScan = { output: '', finishedAt: null };

  constructor(
    private readonly tool: BleTool,
    private readonly session: SessionStore,
    private readonly registry: TargetRegistry,
    private readonly preferences: PreferencesService,
  ) {
    super();
  }

  startScan(): ScanStartResult {
    if (this.scanTask || this.session.isScanning()) {
      logger.info('Scan already in progress');
      return 'busy';
    }

    this.session.beginScan();
    logger.info('Scan started');
    this.notify('scan-started');
    this.scanTask = this.runScan().finally(() => {
      this.scanTask = null;
      this.notify('scan-finished');
    });
    return 'started';
  }

  /** Resolves once the running scan, if any, has been recorded. */
  async waitForScan(): Promise<void> {
    await this.scanTask;
  }

  /** Scheduled scans yield to anything already running. */
  async runScheduledScan(): Promise<boolean> {
    if (this.session.isBusy() || this.scanTask) {
      logger.debug('Skipping scheduled scan while busy');
      return false;
    }
    this.startScan();
    await this.waitForScan();
    return true;
  }

  getLastScan(): LastScan {
    return { ...this.lastScan };
  }

  currentAttack(): string | null {
    return this.attack?.mac ?? null;
  }

  /** Resolves once the new attack is running. */
  startAttack(mac: string): Promise<void> {
    this.session.selectTarget(mac);
    return this.enqueue(async () => {
      await this.cancelAttack();
      this.launchAttack(mac);
    });
  }

  /** Resolves to false when there was nothing to stop. */
  stopAttack(): Promise<boolean> {
    return this.enqueue(() => this.cancelAttack());
  }

  async adapterStatus(): Promise<string> {
    const result = await this.tool.adapterStatus();
    if (result.ok) return result.value;
    logger.warn({ kind: result.error.kind }, 'Adapter status query failed');
    return `Error: ${describeFailure(result.error)}\n${result.error.stdout}${result.error.stderr}`;
  }

  private notify(activity: BleActivity): void {
    this.emit('activity', activity);
  }

  private enqueue<T>(transition: () => Promise<T>): Promise<T> {
    const next = this.transitions.then(transition);
    this.transitions = next.catch((error: unknown) => {
      logger.error({ err: error }, 'Attack transition failed');
    });
    return next;
  }

  private async cancelAttack(): Promise<boolean> {
    const current = this.attack;
    if (!current) return false;
    logger.info({ mac: current.mac }, 'Stopping attack');
    current.controller.abort();
    await current.done;
    return true;
  }

  private launchAttack(mac: string): void {
    const controller = new AbortController();
    const timeoutSeconds = this.preferences.get().attackTimeout;

    this.session.beginAttack(mac);
    logger.info({ mac, timeoutSeconds }, 'Attack started');
    this.notify('attack-started');

    const done = this.runAttack(mac, timeoutSeconds, controller.signal).finally(() => {
      if (this.attack?.controller === controller) {
        this.attack = null;
      }
      this.notify('attack-finished');
    });
    this.attack = { mac, controller, done };
  }

  private async runAttack(mac: string, timeoutSeconds: number, signal: AbortSignal): Promise<void> {
    let result: BleToolResult;
    try {
      result = await this.tool.deauth(mac, timeoutSeconds, signal);
    } catch (error) {
      logger.error({ err: error, mac }, 'Attack could not be run');
      this.session.failAttack();
      return;
    }

    const hasTargets = this.registry.latestTargets().length > 0;

    if (result.ok) {
      logger.info({ mac }, 'Attack completed');
      this.session.endAttack('completed', hasTargets);
      return;
    }

    if (result.error.kind === 'aborted' || signal.aborted) {
      logger.info({ mac }, 'Attack stopped');
      this.session.endAttack('stopped', hasTargets);
      return;
    }

    logger.warn({ mac, kind: result.error.kind, stderr: result.error.stderr }, `Attack ${describeFailure(result.error)}`);
    this.session.failAttack();
  }

  private async runScan(): Promise<void> {
    let result: BleToolResult;
    try {
      result = await this.tool.scan();
    } catch (error) {
      logger.error({ err: error }, 'Scan could not be run');
      this.session.failScan();
      return;
    }

    const finishedAt = new Date();

    if (!result.ok) {
      this.lastScan = { output: `${result.error.stdout}${result.error.stderr}`, finishedAt: finishedAt.toISOString() };
      logger.warn({ kind: result.error.kind, stderr: result.error.stderr }, `Scan ${describeFailure(result.error)}`);
      this.session.failScan();
      return;
    }

    this.lastScan = { output: result.value, finishedAt: finishedAt.toISOString() };

    try {
      const devices = parseScanOutput(result.value);
      const { found, newTargets } = this.registry.recordScan(devices, finishedAt);
      this.session.completeScan(found, this.registry.size);
      logger.info({ found, newTargets }, 'Scan finished');
    } catch (error) {
      logger.error({ err: error }, 'Scan output could not be parsed');
      this.session.failScan();
    }
  }
}
