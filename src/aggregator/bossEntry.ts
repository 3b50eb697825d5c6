import type { SharedSighting } from '../domain/sighting.js';
import { RingBuffer } from '../utils/ringBuffer.js';
import type { RaidBoss } from './types.js';

export class BossEntry {
  readonly boss: RaidBoss;
  lastSeen: number;
  private history: RingBuffer<SharedSighting>;

  constructor(boss: RaidBoss, historySize: number, first: SharedSighting) {
    this.boss = boss;
    this.lastSeen = first.createdAt;
    this.history = new RingBuffer<SharedSighting>(historySize);
    this.history.push(first);
  }

  record(sighting: SharedSighting): void {
    this.lastSeen = sighting.createdAt;
    this.history.push(sighting);

    // First image wins; later ones are ignored even if they differ.
    if (this.boss.image === undefined && sighting.image !== undefined) {
      this.boss.image = sighting.image;
    }
  }

  /** Copy of the boss metadata; callers can't reach the table through it. */
  snapshotBoss(): RaidBoss {
    return { ...this.boss };
  }

  recent(): SharedSighting[] {
    return this.history.snapshot();
  }
}
