import type { Mood, PetStats, ScanStatus, SessionCounters, SessionSnapshot } from '@vampgotchi/common';

export const IDLE_MOOD_AFTER_MS = 30_000;
export const HUNGER_DECAY_EVERY_MS = 60_000;
export const AUTO_MESSAGE_EVERY_MS = 120_000;
export const ACTIVITY_LOG_SIZE = 5;
export const HUNGER_MAX = 1000;
export const BLOOD_MAX = 100;
export const ATTACK_HUNGER_PER_TICK = 5;
export const ATTACK_BLOOD_PER_TICK = 2;
export const SCAN_HUNGER_PER_TICK = 2;
export const SPOOKY_MESSAGE = '> Feeling spooky!';

export const AUTO_MESSAGES = [
  '> Slept well in.',
  '> Learned new trick!',
  SPOOKY_MESSAGE,
  '> Ready to hunt!',
  '> Resting in coffin.',
] as const;

export type AttackOutcome = 'completed' | 'stopped';

export interface SessionStoreOptions {
  now?: () => number;
  random?: () => number;
}

interface PetState {
  hunger: number;
  blood: number;
  level: number;
  exp: number;
  expToNext: number;
  money: number;
  activity: string[];
}

const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

/**
 * Owns the mutable session: scan/attack flags, mood, counters and the pet stats.
 *
 * Mood has no setter. It follows scan and attack outcomes, and `tick` lets it
 * decay to `bored` once the device has been idle for a while.
 */
export class SessionStore {
  private readonly now: () => number;
  private readonly random: () => number;

  private scanStatus: ScanStatus = 'Idle';
  private attacking = false;
  private selectedTarget = '';
  private mood: Mood = 'bored';
  private readonly counters: SessionCounters = { totalScans: 0, totalAttacks: 0, uniqueTargets: 0 };
  private readonly pet: PetState = {
    hunger: 800,
    blood: 100,
    level: 5,
    exp: 150,
    expToNext: 200,
    money: 400,
    activity: [],
  };

  private readonly startedAt: number;
  private lastActivityAt: number;
  private lastHungerDecayAt: number;
  private lastAutoMessageAt: number;

  constructor(options: SessionStoreOptions = {}) {
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
    const now = this.now();
    this.startedAt = now;
    this.lastActivityAt = now;
    this.lastHungerDecayAt = now;
    this.lastAutoMessageAt = now;
  }

  snapshot(): SessionSnapshot {
    return {
      scanStatus: this.scanStatus,
      attacking: this.attacking,
      selectedTarget: this.selectedTarget,
      mood: this.mood,
      counters: { ...this.counters },
      pet: this.petStats(),
      startedAt: new Date(this.startedAt).toISOString(),
      lastActivityAt: new Date(this.lastActivityAt).toISOString(),
    };
  }

  uptimeMs(): number {
    return this.now() - this.startedAt;
  }

  isScanning(): boolean {
    return this.scanStatus === 'Scanning';
  }

  isAttacking(): boolean {
    return this.attacking;
  }

  isBusy(): boolean {
    return this.attacking || this.isScanning();
  }

  selectTarget(mac: string): void {
    this.selectedTarget = mac;
  }

  beginScan(): void {
    this.scanStatus = 'Scanning';
    this.mood = 'excited';
    this.pet.hunger = clamp(this.pet.hunger - 10, 0, HUNGER_MAX);
    this.log('> Scanning...');
    this.touch();
  }

  completeScan(found: number, uniqueTargets: number): void {
    this.counters.totalScans += 1;
    this.counters.uniqueTargets = uniqueTargets;

    if (found > 0) {
      this.mood = 'happy';
      this.pet.exp += found * 5;
      this.pet.money += found * 2;
      this.pet.blood = clamp(this.pet.blood + 5, 0, BLOOD_MAX);
      this.log('> Found devices!');
      this.checkLevelUp();
    } else {
      this.mood = 'sad';
      this.log('> No devices found');
    }

    this.scanStatus = 'Done';
    this.touch();
  }

  failScan(): void {
    this.scanStatus = 'Error';
    this.mood = 'sad';
    this.log('> Scan failed');
    this.touch();
  }

  beginAttack(mac: string): void {
    this.attacking = true;
    this.selectedTarget = mac;
    this.mood = 'angry';
    this.counters.totalAttacks += 1;
    this.pet.hunger = clamp(this.pet.hunger - 20, 0, HUNGER_MAX);
    this.pet.blood = clamp(this.pet.blood + 10, 0, BLOOD_MAX);
    this.pet.exp += 15;
    this.pet.money += 10;
    this.log('> Attacking target!');
    this.checkLevelUp();
    this.touch();
  }

  endAttack(outcome: AttackOutcome, hasTargets: boolean): void {
    this.attacking = false;
    this.mood = hasTargets ? 'happy' : 'bored';
    this.log(outcome === 'completed' ? '> Attack completed!' : '> Attack stopped!');
    this.touch();
  }

  failAttack(): void {
    this.attacking = false;
    this.mood = 'sad';
    this.log('> Attack failed!');
    this.touch();
  }

  /**
   * Updates run by the display loop on every refresh. Activity feeds on hunger
   * per refresh; an idle pet loses hunger once a minute instead.
   */
  tick(hasTargets = false): void {
    const now = this.now();

    if (this.attacking) {
      this.pet.hunger = clamp(this.pet.hunger - ATTACK_HUNGER_PER_TICK, 0, HUNGER_MAX);
      this.pet.blood = clamp(this.pet.blood + ATTACK_BLOOD_PER_TICK, 0, BLOOD_MAX);
    } else if (this.isScanning()) {
      this.pet.hunger = clamp(this.pet.hunger - SCAN_HUNGER_PER_TICK, 0, HUNGER_MAX);
    } else if (hasTargets && !this.pet.activity.at(-1)?.includes('Feeling')) {
      this.log(SPOOKY_MESSAGE);
    }

    if (this.isBusy()) {
      this.lastActivityAt = now;
      this.lastHungerDecayAt = now;
    } else {
      if (now - this.lastActivityAt > IDLE_MOOD_AFTER_MS && this.mood !== 'sad' && this.mood !== 'angry') {
        this.mood = 'bored';
      }
      if (now - this.lastHungerDecayAt >= HUNGER_DECAY_EVERY_MS) {
        this.pet.hunger = clamp(this.pet.hunger - 1, 0, HUNGER_MAX);
        this.lastHungerDecayAt = now;
      }
    }

    if (now - this.lastAutoMessageAt >= AUTO_MESSAGE_EVERY_MS) {
      const index = Math.min(AUTO_MESSAGES.length - 1, Math.floor(this.random() * AUTO_MESSAGES.length));
      this.log(AUTO_MESSAGES[index]);
      this.lastAutoMessageAt = now;
    }
  }

  private petStats(): PetStats {
    return {
      hunger: this.pet.hunger,
      blood: this.pet.blood,
      level: this.pet.level,
      exp: this.pet.exp,
      expToNext: this.pet.expToNext,
      money: this.pet.money,
      coffin: this.isBusy() ? 'AWAKE' : 'SLEEPING',
      activity: [...this.pet.activity],
    };
  }

  private checkLevelUp(): void {
    if (this.pet.exp < this.pet.expToNext) return;
    this.pet.level += 1;
    this.pet.exp = 0;
    this.pet.expToNext = Math.floor(this.pet.expToNext * 1.5);
    this.log('> Level up!');
  }

  private log(message: string): void {
    this.pet.activity.push(message);
    if (this.pet.activity.length > ACTIVITY_LOG_SIZE) {
      this.pet.activity.splice(0, this.pet.activity.length - ACTIVITY_LOG_SIZE);
    }
  }

  private touch(): void {
    this.lastActivityAt = this.now();
  }
}
