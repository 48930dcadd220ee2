import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FilePanelDriver, createPanelDriver } from './display.panel.js';
import { Frame } from './frame.js';

describe('FilePanelDriver', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'vampgotchi-panel-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes frames as PBM tagged with the refresh mode', async () => {
    const path = join(dir, 'run', 'frame.pbm');
    const driver = new FilePanelDriver(path);
    await driver.init();

    await driver.display(new Frame(8, 1));
    expect((await readFile(path)).toString('ascii', 0, 16)).toBe('P4\n# refresh=ful');

    await driver.displayPartial(new Frame(8, 1));
    expect((await readFile(path)).toString('ascii')).toContain('# refresh=partial\n8 1\n');
  });
});

describe('createPanelDriver', () => {
  it('returns no panel for the none driver', () => {
    expect(createPanelDriver('none', '/unused')).toBeNull();
    expect(createPanelDriver('file', '/tmp/frame.pbm')).toBeInstanceOf(FilePanelDriver);
  });
});
