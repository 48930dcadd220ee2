import { resolve } from 'path';

import { env } from '../../config/env.js';
import type { PreferencesRepository } from './preferences.repository.js';
import { PreferencesService } from './preferences.service.js';
import { YamlPreferencesRepository } from './preferences.yaml-repository.js';

export function createPreferencesRepository(): PreferencesRepository {
  return new YamlPreferencesRepository(resolve(env.PREFERENCES_DEFAULTS_FILE), resolve(env.PREFERENCES_FILE));
}

export async function createPreferencesModule(repository: PreferencesRepository = createPreferencesRepository()) {
  const service = new PreferencesService(repository);
  await service.load();
  return { service };
}

export type PreferencesModule = Awaited<ReturnType<typeof createPreferencesModule>>;
