import type { Language, SharedSighting } from '../domain/sighting.js';
import type { ReplySender } from './replyBridge.js';

export type RaidBoss = {
  name: string;
  level: number;
  /** First boss image seen for this name. Never replaced afterwards. */
  image?: string;
  language: Language;
};

export type AggregatorStats = {
  bosses: number;
  /** Sightings applied since the loop started. */
  sightings: number;
  /** Commands waiting in the mailbox when the stats were taken. */
  mailboxDepth: number;
  historySize: number;
};

export type Command =
  | { kind: 'listBosses'; reply: ReplySender<RaidBoss[]> }
  | { kind: 'recentHistory'; bossName: string; reply: ReplySender<SharedSighting[]> }
  | { kind: 'stats'; reply: ReplySender<AggregatorStats> };
