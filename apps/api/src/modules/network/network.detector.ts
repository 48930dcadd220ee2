import { networkInterfaces as systemInterfaces, type NetworkInterfaceInfo } from 'os';

import type { NetworkMode, NetworkStatus } from '@vampgotchi/common';

import { subnetPrefix } from './network.templates.js';

export const FALLBACK_IP = '127.0.0.1';

export type InterfaceTable = NodeJS.Dict<NetworkInterfaceInfo[]>;

const firstIpv4 = (entries: NetworkInterfaceInfo[] | undefined) =>
  entries?.find((entry) => entry.family === 'IPv4' && !entry.internal)?.address;

/** External IPv4 address, preferring the Wi-Fi interface. */
export const detectIp = (preferredInterface: string, table: InterfaceTable = systemInterfaces()): string => {
  const preferred = firstIpv4(table[preferredInterface]);
  if (preferred) return preferred;

  for (const entries of Object.values(table)) {
    const address = firstIpv4(entries);
    if (address) return address;
  }
  return FALLBACK_IP;
};

export const modeForIp = (ip: string, apIp: string): NetworkMode =>
  subnetPrefix(ip) === subnetPrefix(apIp) ? 'AP' : 'CLIENT';

export const detectNetworkStatus = (
  preferredInterface: string,
  apIp: string,
  table: InterfaceTable = systemInterfaces(),
): NetworkStatus => {
  const ip = detectIp(preferredInterface, table);
  return { mode: modeForIp(ip, apIp), ip };
};
