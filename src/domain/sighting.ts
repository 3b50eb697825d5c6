export const LANGUAGES = ['English', 'Japanese'] as const;

export type Language = (typeof LANGUAGES)[number];

/** One raid call seen on the feed. */
export type Sighting = {
  tweetId: string;
  /** Battle ID players paste into the game to join. */
  raidId: string;
  bossName: string;
  /** Screen name of the account that posted the call. */
  user: string;
  userImage?: string;
  /** Free text the poster wrote before the raid marker. */
  text?: string;
  /** Boss artwork attached to the tweet, if any. */
  image?: string;
  createdAt: number; // epoch ms
  language: Language;
};

/**
 * The single frozen instance stored in history buffers and handed to query callers.
 * Every holder shares this reference; nothing copies it after ingestion.
 */
export type SharedSighting = Readonly<Sighting>;

export function shareSighting(sighting: Sighting): SharedSighting {
  return Object.freeze({ ...sighting });
}
