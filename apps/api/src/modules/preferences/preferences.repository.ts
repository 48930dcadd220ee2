import type { Preferences, PreferencesLayer } from '@vampgotchi/common';

export interface PreferencesRepository {
  /** Stored layers, lowest precedence first. */
  loadLayers(): Promise<PreferencesLayer[]>;
  save(preferences: Preferences): Promise<void>;
}
