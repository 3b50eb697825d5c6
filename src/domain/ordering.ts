import type { RaidBoss } from '../aggregator/types.js';
import type { SharedSighting } from './sighting.js';

/** Level ascending, then name. Returns a new array. */
export function sortBosses(bosses: readonly RaidBoss[]): RaidBoss[] {
  return [...bosses].sort((a, b) => a.level - b.level || a.name.localeCompare(b.name));
}

/** History snapshots carry no order; this gives the newest sighting first. */
export function newestFirst(sightings: readonly SharedSighting[]): SharedSighting[] {
  return [...sightings].sort((a, b) => b.createdAt - a.createdAt);
}
