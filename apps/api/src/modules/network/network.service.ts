import { readFile, writeFile } from 'fs/promises';

import type { ClientModeInput, NetworkMode, NetworkStatus, NetworkSwitchReport } from '@vampgotchi/common';

import { logger } from '../../core/logger/index.js';
import { describeFailure, type CommandRunner } from '../../shared/system/command-runner.js';
import type { PreferencesService } from '../preferences/preferences.service.js';
import { detectNetworkStatus, type InterfaceTable } from './network.detector.js';
import {
  removeDhcpcdBlock,
  renderDhcpcdBlock,
  renderDnsmasqConf,
  renderHostapdConf,
  renderWpaSupplicantConf,
  upsertDhcpcdBlock,
  type AccessPointSettings,
} from './network.templates.js';

export interface NetworkConfigPaths {
  hostapd: string;
  dnsmasq: string;
  dhcpcd: string;
  wpaSupplicant: string;
}

export interface NetworkServiceOptions {
  runner: CommandRunner;
  preferences: PreferencesService;
  paths: NetworkConfigPaths;
  interfaceName: string;
  country: string;
  interfaces?: () => InterfaceTable;
}

export type SwitchStartResult = 'started' | 'busy';

const SYSTEMCTL_TIMEOUT_MS = 30_000;

const isMissingFile = (error: unknown) =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

/**
 * Switches the Wi-Fi interface between access point and client mode by
 * rewriting daemon configuration and restarting services.
 *
 * A failing step is recorded in the switch report and the remaining steps
 * still run. Nothing is rolled back.
 */
export class NetworkService {
  private report: NetworkSwitchReport = {
    target: null,
    state: 'idle',
    startedAt: null,
    finishedAt: null,
    failures: [],
  };
  private task: Promise<void> | null = null;

  constructor(private readonly options: NetworkServiceOptions) {}

  status(): NetworkStatus {
    const { interfaceName, interfaces, preferences } = this.options;
    return detectNetworkStatus(interfaceName, preferences.get().apIp, interfaces?.());
  }

  getSwitchReport(): NetworkSwitchReport {
    return { ...this.report, failures: [...this.report.failures] };
  }

  async waitForSwitch(): Promise<void> {
    await this.task;
  }

  startSwitchToAp(): SwitchStartResult {
    return this.start('AP', () => this.switchToAp());
  }

  startSwitchToClient(input: ClientModeInput): SwitchStartResult {
    return this.start('CLIENT', () => this.switchToClient(input));
  }

  private start(target: NetworkMode, run: () => Promise<void>): SwitchStartResult {
    if (this.task) {
      logger.warn({ target, current: this.report.target }, 'Network switch already in progress');
      return 'busy';
    }

    this.report = {
      target,
      state: 'switching',
      startedAt: new Date().toISOString(),
      finishedAt: null,
      failures: [],
    };
    logger.info({ target }, 'Network switch started');

    this.task = run()
      .catch((error: unknown) => {
        this.report.failures.push(errorMessage(error));
      })
      .finally(() => {
        const { failures } = this.report;
        this.report.state = failures.length > 0 ? 'failed' : 'done';
        this.report.finishedAt = new Date().toISOString();
        if (failures.length > 0) {
          logger.warn({ target, failures }, 'Network switch finished with failures');
        } else {
          logger.info({ target }, 'Network switch finished');
        }
        this.task = null;
      });
    return 'started';
  }

  private accessPointSettings(): AccessPointSettings {
    const { apSsid, apPassphrase, apIp } = this.options.preferences.get();
    return { interfaceName: this.options.interfaceName, ssid: apSsid, passphrase: apPassphrase, ip: apIp };
  }

  private async switchToAp(): Promise<void> {
    const settings = this.accessPointSettings();
    const { paths } = this.options;

    await this.systemctl('stop', 'wpa_supplicant');
    await this.systemctl('stop', 'dhcpcd');
    await this.write(paths.hostapd, renderHostapdConf(settings));
    await this.write(paths.dnsmasq, renderDnsmasqConf(settings));
    await this.editDhcpcd((contents) => upsertDhcpcdBlock(contents, renderDhcpcdBlock(settings)));
    await this.systemctl('daemon-reload');
    await this.systemctl('restart', 'dhcpcd');
    await this.systemctl('unmask', 'hostapd');
    await this.systemctl('restart', 'hostapd');
    await this.systemctl('restart', 'dnsmasq');
  }

  private async switchToClient({ ssid, password }: ClientModeInput): Promise<void> {
    const { paths, country } = this.options;

    await this.systemctl('stop', 'hostapd');
    await this.systemctl('stop', 'dnsmasq');
    await this.editDhcpcd(removeDhcpcdBlock);
    await this.write(paths.wpaSupplicant, renderWpaSupplicantConf({ country, ssid, password }), 0o600);
    await this.systemctl('restart', 'dhcpcd');
    await this.systemctl('restart', 'wpa_supplicant');
  }

  private async systemctl(...args: string[]): Promise<void> {
    const result = await this.options.runner.run('systemctl', args, { timeoutMs: SYSTEMCTL_TIMEOUT_MS });
    if (result.ok) {
      logger.debug({ args }, 'systemctl succeeded');
      return;
    }
    this.fail(`systemctl ${args.join(' ')}: ${describeFailure(result.error)}`, result.error.stderr.trim());
  }

  private async write(path: string, contents: string, mode?: number): Promise<void> {
    try {
      await writeFile(path, contents, { encoding: 'utf8', mode });
      logger.debug({ path }, 'Configuration written');
    } catch (error) {
      this.fail(`write ${path}: ${errorMessage(error)}`);
    }
  }

  private async editDhcpcd(edit: (contents: string) => string): Promise<void> {
    const path = this.options.paths.dhcpcd;
    let contents = '';
    try {
      contents = await readFile(path, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) {
        this.fail(`read ${path}: ${errorMessage(error)}`);
        return;
      }
    }

    const updated = edit(contents);
    if (updated === contents) return;
    await this.write(path, updated);
  }

  private fail(message: string, detail?: string): void {
    logger.error({ detail }, message);
    this.report.failures.push(message);
  }
}
