import type { Express, Response } from 'express';
import express from 'express';
import { makeBearerAuth } from './middleware/auth.js';
import { isAggregatorClosed, type AggregatorHandle } from '../aggregator/index.js';
import { newestFirst, sortBosses } from '../domain/ordering.js';
import { RaidTweetSchema, parseRaidTweet } from '../domain/raidTweet.js';
import type { SightingFeed } from '../feed/sightingFeed.js';
import { DedupeStore } from '../utils/dedupe.js';
import { logger } from '../utils/logger.js';

export type RouteDeps = {
  aggregator: AggregatorHandle;
  feed: SightingFeed;
  ingestToken: string;
  dedupeCapacity: number;
};

function replyFailed(res: Response, route: string, err: unknown): Response {
  if (isAggregatorClosed(err)) {
    return res.status(503).json({ error: 'aggregator_closed' });
  }
  logger.error('route_failed', { route, err: String(err) });
  return res.status(500).json({ error: 'internal_error' });
}

export function registerRoutes(app: Express, deps: RouteDeps): void {
  app.use(express.json({ limit: '256kb' }));

  const { aggregator, feed } = deps;
  const ingestAuth = makeBearerAuth(deps.ingestToken);
  const dedupe = new DedupeStore(deps.dedupeCapacity); // recent tweet ids

  app.get('/health', (_req, res) => {
    res.status(200).json({ ok: true, ts: Date.now() });
  });

  app.get('/status', async (_req, res) => {
    try {
      const stats = await aggregator.stats();
      res.status(200).json({ ok: true, ...stats, feed: feed.status() });
    } catch (err) {
      replyFailed(res, 'status', err);
    }
  });

  app.get('/bosses', async (_req, res) => {
    try {
      const bosses = await aggregator.listBosses();
      res.status(200).json({ bosses: sortBosses(bosses) });
    } catch (err) {
      replyFailed(res, 'bosses', err);
    }
  });

  app.get('/bosses/:name/recent', async (req, res) => {
    const bossName = req.params.name;
    try {
      const sightings = await aggregator.recentHistory(bossName);
      res.status(200).json({ boss: bossName, sightings: newestFirst(sightings) });
    } catch (err) {
      replyFailed(res, 'boss_recent', err);
    }
  });

  app.post('/events/tweet', ingestAuth, (req, res) => {
    const parsed = RaidTweetSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'invalid_payload', issues: parsed.error.issues });
    }

    const tweet = parsed.data;
    if (!dedupe.markOnce(`tweet:${tweet.id}`)) {
      return res.status(200).json({ ok: true, deduped: true });
    }

    const sighting = parseRaidTweet(tweet);
    if (!sighting) {
      return res.status(200).json({ ok: true, ignored: true });
    }

    if (!feed.push(sighting)) {
      return res.status(503).json({ error: 'feed_closed' });
    }
    return res.status(202).json({ ok: true, raidId: sighting.raidId, boss: sighting.bossName });
  });
}
