import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';

import { parse, stringify } from 'yaml';
import { preferencesLayerSchema, type Preferences, type PreferencesLayer } from '@vampgotchi/common';

import { logger } from '../../core/logger/index.js';
import type { PreferencesRepository } from './preferences.repository.js';

const isMissingFile = (error: unknown) =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

/**
 * Preferences kept as YAML: an optional defaults document shipped with the
 * appliance, overridden by the user document that `save` rewrites.
 */
export class YamlPreferencesRepository implements PreferencesRepository {
  constructor(
    private readonly defaultsPath: string,
    private readonly userPath: string,
  ) {}

  async loadLayers(): Promise<PreferencesLayer[]> {
    const layers: PreferencesLayer[] = [];
    for (const path of [this.defaultsPath, this.userPath]) {
      const layer = await this.readLayer(path);
      if (layer) layers.push(layer);
    }
    return layers;
  }

  async save(preferences: Preferences): Promise<void> {
    await mkdir(dirname(this.userPath), { recursive: true });
    await writeFile(this.userPath, stringify(preferences), 'utf8');
    logger.debug({ path: this.userPath }, 'Preferences saved');
  }

  private async readLayer(path: string): Promise<PreferencesLayer | null> {
    let source: string;
    try {
      source = await readFile(path, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) {
        logger.warn({ err: error, path }, 'Could not read preferences file');
      }
      return null;
    }

    let document: unknown;
    try {
      document = parse(source);
    } catch (error) {
      logger.warn({ err: error, path }, 'Preferences file is not valid YAML');
      return null;
    }

    const layer = preferencesLayerSchema.safeParse(document ?? {});
    if (!layer.success) {
      logger.warn({ path, issues: layer.error.issues }, 'Ignoring invalid preferences file');
      return null;
    }
    return layer.data;
  }
}
