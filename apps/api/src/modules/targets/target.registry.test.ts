import { describe, expect, it } from 'vitest';

import { TargetRegistry } from './target.registry.js';

const first = new Date('2026-01-01T10:00:00.000Z');
const second = new Date('2026-01-01T10:05:00.000Z');

describe('TargetRegistry', () => {
  it('upserts records and replaces the latest list', () => {
    const registry = new TargetRegistry();

    expect(
      registry.recordScan(
        [
          { mac: 'AA:AA:AA:AA:AA:AA', name: 'one', rssi: -40 },
          { mac: 'BB:BB:BB:BB:BB:BB', name: 'two', rssi: -60 },
        ],
        first,
      ),
    ).toEqual({ found: 2, newTargets: 2 });

    expect(registry.recordScan([{ mac: 'BB:BB:BB:BB:BB:BB', name: 'two', rssi: -50 }], second)).toEqual({
      found: 1,
      newTargets: 0,
    });

    expect(registry.latestTargets()).toEqual(['BB:BB:BB:BB:BB:BB']);
    expect(registry.size).toBe(2);
    expect(registry.get('AA:AA:AA:AA:AA:AA')?.lastSeen).toBe(first.toISOString());
    expect(registry.get('BB:BB:BB:BB:BB:BB')).toEqual({
      mac: 'BB:BB:BB:BB:BB:BB',
      name: 'two',
      rssi: -50,
      lastSeen: second.toISOString(),
    });
  });

  it('leaves records in place after an empty scan', () => {
    const registry = new TargetRegistry();
    registry.recordScan([{ mac: 'AA:AA:AA:AA:AA:AA', name: 'one', rssi: -40 }], first);

    expect(registry.recordScan([], second)).toEqual({ found: 0, newTargets: 0 });

    expect(registry.latestTargets()).toEqual([]);
    expect(registry.all()).toHaveLength(1);
  });

  it('summarizes the latest scan in order', () => {
    const registry = new TargetRegistry();
    registry.recordScan(
      [
        { mac: 'CC:CC:CC:CC:CC:CC', name: 'c', rssi: -70 },
        { mac: 'AA:AA:AA:AA:AA:AA', name: 'a', rssi: -30 },
      ],
      first,
    );

    expect(registry.latestSummaries()).toEqual([
      { mac: 'CC:CC:CC:CC:CC:CC', name: 'c', rssi: -70 },
      { mac: 'AA:AA:AA:AA:AA:AA', name: 'a', rssi: -30 },
    ]);
  });
});
