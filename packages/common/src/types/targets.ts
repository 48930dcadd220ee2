/** A device observed by at least one scan, keyed by its canonical MAC address. */
export interface TargetRecord {
  mac: string;
  name: string;
  rssi: number;
  lastSeen: string;
}

export interface TargetSummary {
  mac: string;
  name: string;
  rssi: number;
}

export interface ParsedDevice {
  mac: string;
  name: string;
  rssi: number;
}
