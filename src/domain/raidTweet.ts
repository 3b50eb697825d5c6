import { z } from 'zod';
import type { Language, Sighting } from './sighting.js';

export const RaidTweetSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  /** Epoch ms or an ISO-8601 timestamp. */
  createdAt: z.union([z.number().int().nonnegative(), z.string().datetime({ offset: true })]),
  user: z.object({
    screenName: z.string().min(1),
    profileImageUrl: z.string().url().optional(),
  }),
  mediaUrls: z.array(z.string().url()).default([]),
});

export type RaidTweet = z.infer<typeof RaidTweetSchema>;

type RaidPattern = {
  language: Language;
  pattern: RegExp;
};

// Groups: 1 = free text, 2 = battle id, 3 = boss name line.
const RAID_PATTERNS: RaidPattern[] = [
  { language: 'Japanese', pattern: /^([\s\S]*?)参加者募集！参戦ID：([0-9A-F]{8})\s*\n(.+)/ },
  { language: 'English', pattern: /^([\s\S]*?)I need backup!\s*Battle ID:\s*([0-9A-F]{8})\s*\n(.+)/ },
];

const TRAILING_URL = /\s*https?:\/\/\S+\s*$/;

function toEpochMs(createdAt: RaidTweet['createdAt']): number {
  return typeof createdAt === 'number' ? createdAt : Date.parse(createdAt);
}

/**
 * Turns a raid call tweet into a sighting. Returns null for anything that is not a raid call.
 */
export function parseRaidTweet(tweet: RaidTweet): Sighting | null {
  for (const { language, pattern } of RAID_PATTERNS) {
    const m = pattern.exec(tweet.text.replace(/\r\n/g, '\n'));
    if (!m) continue;

    const [, rawText = '', raidId = '', rawBoss = ''] = m;
    const bossName = rawBoss.replace(TRAILING_URL, '').trim();
    if (!bossName) return null;

    const text = rawText.trim();
    const sighting: Sighting = {
      tweetId: tweet.id,
      raidId,
      bossName,
      user: tweet.user.screenName,
      createdAt: toEpochMs(tweet.createdAt),
      language,
    };
    if (tweet.user.profileImageUrl) sighting.userImage = tweet.user.profileImageUrl;
    if (text) sighting.text = text;
    const image = tweet.mediaUrls[0];
    if (image) sighting.image = image;
    return sighting;
  }
  return null;
}
