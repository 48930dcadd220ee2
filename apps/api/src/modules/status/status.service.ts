import type { SessionSnapshot, StatusClass, StatusResponse } from '@vampgotchi/common';

import type { NetworkService } from '../network/network.service.js';
import { formatUptime } from '../session/uptime.js';
import type { SessionStore } from '../session/session.store.js';
import type { TargetRegistry } from '../targets/target.registry.js';

const statusOf = (session: SessionSnapshot): { statusText: string; statusClass: StatusClass } => {
  if (session.attacking) {
    return { statusText: `Attacking ${session.selectedTarget}`, statusClass: 'attacking' };
  }
  if (session.scanStatus === 'Scanning') {
    return { statusText: 'Scanning...', statusClass: 'scanning' };
  }
  if (session.scanStatus === 'Error') {
    return { statusText: 'Error', statusClass: 'idle' };
  }
  return { statusText: 'Idle', statusClass: 'idle' };
};

/** Read-side view over the session, targets and network, shared by the web UI and the display. */
export class StatusService {
  constructor(
    private readonly session: SessionStore,
    private readonly registry: TargetRegistry,
    private readonly network: NetworkService,
  ) {}

  getStatus(): StatusResponse {
    const snapshot = this.session.snapshot();
    const targets = this.registry.latestTargets();
    const network = this.network.status();

    return {
      targets,
      targetsInfo: this.registry.latestSummaries(),
      attacking: snapshot.attacking,
      scanning: snapshot.scanStatus === 'Scanning',
      scanStatus: snapshot.scanStatus,
      selectedTarget: snapshot.selectedTarget,
      ...statusOf(snapshot),
      count: targets.length,
      stats: {
        ...snapshot.counters,
        mood: snapshot.mood,
        uptime: formatUptime(this.session.uptimeMs()),
      },
      pet: snapshot.pet,
      network: {
        ...network,
        switch: this.network.getSwitchReport(),
      },
    };
  }
}
