import { describe, expect, it } from 'vitest';

import { AUTO_MESSAGES, SessionStore, SPOOKY_MESSAGE } from './session.store.js';

const createStore = () => {
  const clock = { now: 0 };
  const store = new SessionStore({ now: () => clock.now, random: () => 0 });
  return { clock, store };
};

describe('SessionStore', () => {
  it('starts idle and bored', () => {
    const { store } = createStore();

    expect(store.snapshot()).toMatchObject({
      scanStatus: 'Idle',
      attacking: false,
      selectedTarget: '',
      mood: 'bored',
      counters: { totalScans: 0, totalAttacks: 0, uniqueTargets: 0 },
      pet: { hunger: 800, blood: 100, level: 5, exp: 150, expToNext: 200, money: 400, coffin: 'SLEEPING' },
    });
  });

  it('becomes happy after a scan that found devices', () => {
    const { store } = createStore();

    store.beginScan();
    expect(store.snapshot()).toMatchObject({ scanStatus: 'Scanning', mood: 'excited', pet: { coffin: 'AWAKE' } });
    store.completeScan(2, 2);

    expect(store.snapshot()).toMatchObject({
      scanStatus: 'Done',
      mood: 'happy',
      counters: { totalScans: 1, uniqueTargets: 2 },
      pet: { hunger: 790, exp: 160, money: 404, activity: ['> Scanning...', '> Found devices!'] },
    });
  });

  it('is Done but sad after an empty scan', () => {
    const { store } = createStore();

    store.beginScan();
    store.completeScan(0, 0);

    expect(store.snapshot()).toMatchObject({ scanStatus: 'Done', mood: 'sad' });
  });

  it('records a failed scan as an error', () => {
    const { store } = createStore();

    store.beginScan();
    store.failScan();

    expect(store.snapshot()).toMatchObject({ scanStatus: 'Error', mood: 'sad' });
    expect(store.isBusy()).toBe(false);
  });

  it('levels up once experience reaches the threshold', () => {
    const { store } = createStore();

    store.beginScan();
    store.completeScan(10, 10);

    expect(store.snapshot().pet).toMatchObject({ level: 6, exp: 0, expToNext: 300 });
    expect(store.snapshot().pet.activity).toContain('> Level up!');
  });

  it('keeps only the last five activity messages', () => {
    const { store } = createStore();

    for (let i = 0; i < 4; i += 1) {
      store.beginScan();
      store.completeScan(0, 0);
    }

    expect(store.snapshot().pet.activity).toEqual([
      '> No devices found',
      '> Scanning...',
      '> No devices found',
      '> Scanning...',
      '> No devices found',
    ]);
  });

  it('follows attack outcomes', () => {
    const { store } = createStore();

    store.beginAttack('AA:BB:CC:DD:EE:FF');
    expect(store.snapshot()).toMatchObject({ attacking: true, mood: 'angry', selectedTarget: 'AA:BB:CC:DD:EE:FF' });

    store.endAttack('stopped', true);
    expect(store.snapshot()).toMatchObject({ attacking: false, mood: 'happy' });

    store.beginAttack('AA:BB:CC:DD:EE:FF');
    store.failAttack();
    expect(store.snapshot()).toMatchObject({ attacking: false, mood: 'sad' });
    expect(store.snapshot().counters.totalAttacks).toBe(2);
  });

  it('drifts back to bored after 30 idle seconds unless sad or angry', () => {
    const { clock, store } = createStore();
    store.beginScan();
    store.completeScan(1, 1);

    clock.now = 30_000;
    store.tick();
    expect(store.snapshot().mood).toBe('happy');

    clock.now = 30_001;
    store.tick();
    expect(store.snapshot().mood).toBe('bored');
  });

  it('stays sad while idle', () => {
    const { clock, store } = createStore();
    store.beginScan();
    store.failScan();

    clock.now = 45_000;
    store.tick();

    expect(store.snapshot().mood).toBe('sad');
  });

  it('loses hunger each idle minute and logs an automatic message every two minutes', () => {
    const { clock, store } = createStore();

    clock.now = 60_000;
    store.tick();
    clock.now = 120_000;
    store.tick();

    expect(store.snapshot().pet.hunger).toBe(798);
    expect(store.snapshot().pet.activity).toEqual([AUTO_MESSAGES[0]]);
  });

  it('burns hunger on every tick while attacking or scanning', () => {
    const { clock, store } = createStore();
    store.beginAttack('AA:BB:CC:DD:EE:FF');

    clock.now = 90_000;
    store.tick();
    store.tick();
    expect(store.snapshot().pet).toMatchObject({ hunger: 770, blood: 100 });

    store.endAttack('stopped', false);
    store.beginScan();
    store.tick();
    expect(store.snapshot().pet.hunger).toBe(758);
  });

  it('feels spooky once while idle with targets around', () => {
    const { store } = createStore();

    store.tick(true);
    store.tick(true);
    store.tick(false);

    expect(store.snapshot().pet.activity).toEqual([SPOOKY_MESSAGE]);
  });
});
