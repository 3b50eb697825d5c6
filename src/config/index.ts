import * as dotenv from 'dotenv';

dotenv.config();

function flag(value: string | undefined): boolean {
  return value === '1' || value === 'true' || value === 'yes';
}

function intFrom(value: string | undefined, fallback: number): number {
  const n = Number(value ?? fallback);
  return Number.isInteger(n) ? n : fallback;
}

export const config = {
  port: intFrom(process.env.PORT, 8787),

  // Bearer token for the ingest endpoint. Empty = open (local dev only).
  ingestToken: process.env.RAIDFEED_TOKEN || '',

  // Sightings kept per boss. 0 keeps boss metadata only.
  historySize: Math.max(0, intFrom(process.env.RAIDFEED_HISTORY_SIZE, 20)),

  // Sightings waiting for the aggregator before the oldest gets dropped.
  feedCapacity: Math.max(1, intFrom(process.env.RAIDFEED_FEED_CAPACITY, 1000)),

  // Recent tweet ids remembered to drop redelivered tweets.
  dedupeCapacity: Math.max(1, intFrom(process.env.RAIDFEED_DEDUPE_CAPACITY, 5000)),

  // Print the boss list to stdout on a schedule (node-cron syntax, seconds field allowed).
  bossListEnabled: flag(process.env.RAIDFEED_BOSS_LIST),
  bossListCron: process.env.RAIDFEED_BOSS_LIST_CRON || '*/5 * * * * *',

  logSightings: flag(process.env.RAIDFEED_LOG_SIGHTINGS),
};
