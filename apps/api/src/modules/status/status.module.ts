import type { NetworkService } from '../network/network.service.js';
import type { SessionStore } from '../session/session.store.js';
import type { TargetRegistry } from '../targets/target.registry.js';
import { createStatusRouter } from './status.router.js';
import { StatusService } from './status.service.js';

export function createStatusModule(session: SessionStore, registry: TargetRegistry, network: NetworkService) {
  const service = new StatusService(session, registry, network);
  return { service, router: createStatusRouter(service) };
}

export type StatusModule = ReturnType<typeof createStatusModule>;
