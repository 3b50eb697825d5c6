// "Lvl 60 Ozorotter" (English client) or "Lv60 オオゾラッコ" (Japanese client)
const LEVEL_PREFIX = /^Lvl?\s*(\d+)\s+\S/;

export const DEFAULT_BOSS_LEVEL = 0;

export function parseBossLevel(bossName: string): number | undefined {
  const m = LEVEL_PREFIX.exec(bossName.trim());
  if (!m?.[1]) return undefined;
  const level = Number(m[1]);
  return Number.isSafeInteger(level) ? level : undefined;
}
