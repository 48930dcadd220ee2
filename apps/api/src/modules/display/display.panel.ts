import { mkdir, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';

import { logger } from '../../core/logger/index.js';
import type { Frame } from './frame.js';

export type RefreshMode = 'full' | 'partial';

export type PanelDriverKind = 'none' | 'file';

/** An e-paper panel. `displayPartial` is absent on panels without fast refresh. */
export interface PanelDriver {
  readonly name: string;
  init(): Promise<void>;
  display(frame: Frame): Promise<void>;
  displayPartial?(frame: Frame): Promise<void>;
  sleep(): Promise<void>;
}

/**
 * Hands frames to an external panel daemon as PBM files. The refresh mode is
 * recorded as a header comment; the file is replaced atomically.
 */
export class FilePanelDriver implements PanelDriver {
  readonly name = 'file';

  constructor(private readonly path: string) {}

  async init(): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
  }

  display(frame: Frame): Promise<void> {
    return this.write(frame, 'full');
  }

  displayPartial(frame: Frame): Promise<void> {
    return this.write(frame, 'partial');
  }

  async sleep(): Promise<void> {
    logger.debug({ path: this.path }, 'File panel has nothing to put to sleep');
  }

  private async write(frame: Frame, mode: RefreshMode): Promise<void> {
    const temporary = `${this.path}.tmp`;
    await writeFile(temporary, frame.toPbm(`refresh=${mode}`));
    await rename(temporary, this.path);
  }
}

export const createPanelDriver = (kind: PanelDriverKind, framePath: string): PanelDriver | null => {
  switch (kind) {
    case 'file':
      return new FilePanelDriver(framePath);
    case 'none':
      return null;
  }
};
