import type { Preferences, PreferencesLayer } from '@vampgotchi/common';

import type { PreferencesRepository } from './preferences.repository.js';

export class InMemoryPreferencesRepository implements PreferencesRepository {
  saved: Preferences | null = null;
  failSaves = false;

  constructor(private readonly layers: PreferencesLayer[] = []) {}

  async loadLayers(): Promise<PreferencesLayer[]> {
    return this.saved ? [...this.layers, this.saved] : [...this.layers];
  }

  async save(preferences: Preferences): Promise<void> {
    if (this.failSaves) {
      throw new Error('Preferences storage is read-only');
    }
    this.saved = { ...preferences };
  }
}
