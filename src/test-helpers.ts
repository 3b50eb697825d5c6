import type { Sighting } from './domain/sighting.js';

let seq = 0;

export function makeSighting(overrides: Partial<Sighting> = {}): Sighting {
  seq++;
  return {
    tweetId: `tweet-${seq}`,
    raidId: `${(0xa0000000 + seq).toString(16).toUpperCase()}`,
    bossName: 'Lvl 60 Ozorotter',
    user: 'raider',
    createdAt: 1_700_000_000_000 + seq * 1000,
    language: 'English',
    ...overrides,
  };
}

/** Lets every queued microtask (and so every ready aggregator event) run. */
export function settle(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
