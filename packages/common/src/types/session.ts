import type { NetworkMode, NetworkSwitchReport } from './network.js';
import type { TargetSummary } from './targets.js';

export type ScanStatus = 'Idle' | 'Scanning' | 'Done' | 'Error';

export type Mood = 'bored' | 'happy' | 'excited' | 'sad' | 'angry';

export type CoffinStatus = 'SLEEPING' | 'AWAKE';

export interface PetStats {
  hunger: number;
  blood: number;
  level: number;
  exp: number;
  expToNext: number;
  money: number;
  coffin: CoffinStatus;
  activity: string[];
}

export interface SessionCounters {
  totalScans: number;
  totalAttacks: number;
  uniqueTargets: number;
}

export interface SessionSnapshot {
  scanStatus: ScanStatus;
  attacking: boolean;
  selectedTarget: string;
  mood: Mood;
  counters: SessionCounters;
  pet: PetStats;
  startedAt: string;
  lastActivityAt: string;
}

export type StatusClass = 'idle' | 'scanning' | 'attacking';

export interface StatusResponse {
  targets: string[];
  targetsInfo: TargetSummary[];
  attacking: boolean;
  scanning: boolean;
  scanStatus: ScanStatus;
  selectedTarget: string;
  statusText: string;
  statusClass: StatusClass;
  count: number;
  stats: SessionCounters & {
    mood: Mood;
    uptime: string;
  };
  pet: PetStats;
  network: {
    mode: NetworkMode;
    ip: string;
    switch: NetworkSwitchReport;
  };
}
