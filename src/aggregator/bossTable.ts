import { DEFAULT_BOSS_LEVEL, parseBossLevel } from '../domain/bossName.js';
import type { SharedSighting } from '../domain/sighting.js';
import { BossEntry } from './bossEntry.js';
import type { RaidBoss } from './types.js';

export type LevelParser = (bossName: string) => number | undefined;

/**
 * Boss name -> entry. Owned by the actor loop; nothing else holds a reference.
 */
export class BossTable {
  private entries = new Map<string, BossEntry>();
  private applied = 0;

  constructor(
    private historySize: number,
    private parseLevel: LevelParser = parseBossLevel
  ) {}

  /** Not idempotent: replaying a sighting records it again. */
  handleSighting(sighting: SharedSighting): void {
    this.applied++;

    const existing = this.entries.get(sighting.bossName);
    if (existing) {
      existing.record(sighting);
      return;
    }

    const boss: RaidBoss = {
      name: sighting.bossName,
      level: this.parseLevel(sighting.bossName) ?? DEFAULT_BOSS_LEVEL,
      language: sighting.language,
    };
    if (sighting.image !== undefined) boss.image = sighting.image;

    this.entries.set(sighting.bossName, new BossEntry(boss, this.historySize, sighting));
  }

  listBosses(): RaidBoss[] {
    return Array.from(this.entries.values(), e => e.snapshotBoss());
  }

  /** Unknown boss is an empty history, not an error. */
  recentHistory(bossName: string): SharedSighting[] {
    return this.entries.get(bossName)?.recent() ?? [];
  }

  lastSeen(bossName: string): number | undefined {
    return this.entries.get(bossName)?.lastSeen;
  }

  stats(): { bosses: number; sightings: number } {
    return { bosses: this.entries.size, sightings: this.applied };
  }
}
