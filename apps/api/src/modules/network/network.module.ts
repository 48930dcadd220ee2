import { env } from '../../config/env.js';
import type { CommandRunner } from '../../shared/system/command-runner.js';
import type { PreferencesService } from '../preferences/preferences.service.js';
import type { InterfaceTable } from './network.detector.js';
import { NetworkService, type NetworkConfigPaths } from './network.service.js';

export interface NetworkModuleOptions {
  paths?: NetworkConfigPaths;
  interfaces?: () => InterfaceTable;
}

export function createNetworkModule(
  runner: CommandRunner,
  preferences: PreferencesService,
  { paths, interfaces }: NetworkModuleOptions = {},
) {
  const service = new NetworkService({
    runner,
    preferences,
    paths: paths ?? {
      hostapd: env.HOSTAPD_CONF,
      dnsmasq: env.DNSMASQ_CONF,
      dhcpcd: env.DHCPCD_CONF,
      wpaSupplicant: env.WPA_SUPPLICANT_CONF,
    },
    interfaceName: env.WIFI_INTERFACE,
    country: env.WIFI_COUNTRY,
    interfaces,
  });
  return { service };
}

export type NetworkModule = ReturnType<typeof createNetworkModule>;
