import { EventEmitter } from 'events';

import { preferencesSchema, type Preferences, type PublicPreferences } from '@vampgotchi/common';

import { applyDebugMode, logger } from '../../core/logger/index.js';
import type { PreferencesRepository } from './preferences.repository.js';

/** Emits `change` with the new preferences after every successful update. */
export class PreferencesService extends EventEmitter {
  private current: Preferences = preferencesSchema.parse({});

  constructor(private readonly repository: PreferencesRepository) {
    super();
  }

  async load(): Promise<Preferences> {
    const layers = await this.repository.loadLayers();
    this.current = preferencesSchema.parse(Object.assign({}, ...layers));
    applyDebugMode(this.current.debugMode);
    logger.info({ preferences: this.toPublic() }, 'Preferences loaded');
    return this.get();
  }

  get(): Preferences {
    return { ...this.current };
  }

  toPublic(preferences: Preferences = this.current): PublicPreferences {
    const { apPassphrase, ...rest } = preferences;
    return { ...rest, hasApPassphrase: apPassphrase.length > 0 };
  }

  /**
   * Applies the change in memory first. A failed write is logged and the new
   * values stay active until the process exits.
   */
  async update(patch: Partial<Preferences>): Promise<Preferences> {
    this.current = preferencesSchema.parse({ ...this.current, ...patch });
    applyDebugMode(this.current.debugMode);

    try {
      await this.repository.save(this.current);
    } catch (error) {
      logger.error({ err: error }, 'Failed to persist preferences');
    }

    const updated = this.get();
    this.emit('change', updated);
    return updated;
  }
}
