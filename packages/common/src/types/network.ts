export type NetworkMode = 'AP' | 'CLIENT';

export type NetworkSwitchState = 'idle' | 'switching' | 'done' | 'failed';

export interface NetworkSwitchReport {
  target: NetworkMode | null;
  state: NetworkSwitchState;
  startedAt: string | null;
  finishedAt: string | null;
  failures: string[];
}

export interface NetworkStatus {
  mode: NetworkMode;
  ip: string;
}
