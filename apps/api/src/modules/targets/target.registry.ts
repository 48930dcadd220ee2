import type { ParsedDevice, TargetRecord, TargetSummary } from '@vampgotchi/common';

import { UNKNOWN_DEVICE_NAME } from './scan-output.parser.js';

export interface ScanRecordingResult {
  found: number;
  newTargets: number;
}

/**
 * Every device ever seen, plus the ordered MACs of the latest scan. Records are
 * never removed, so the latest list always points at known records.
 */
export class TargetRegistry {
  private readonly records = new Map<string, TargetRecord>();
  private latest: string[] = [];

  recordScan(devices: readonly ParsedDevice[], seenAt: Date = new Date()): ScanRecordingResult {
    let newTargets = 0;
    const macs: string[] = [];

    for (const device of devices) {
      if (!this.records.has(device.mac)) newTargets += 1;
      this.records.set(device.mac, {
        mac: device.mac,
        name: device.name,
        rssi: device.rssi,
        lastSeen: seenAt.toISOString(),
      });
      if (!macs.includes(device.mac)) macs.push(device.mac);
    }

    this.latest = macs;
    return { found: macs.length, newTargets };
  }

  get(mac: string): TargetRecord | undefined {
    return this.records.get(mac);
  }

  latestTargets(): string[] {
    return [...this.latest];
  }

  latestSummaries(): TargetSummary[] {
    return this.latest.map((mac) => {
      const record = this.records.get(mac);
      return {
        mac,
        name: record?.name ?? UNKNOWN_DEVICE_NAME,
        rssi: record?.rssi ?? 0,
      };
    });
  }

  all(): TargetRecord[] {
    return Array.from(this.records.values());
  }

  get size(): number {
    return this.records.size;
  }
}
