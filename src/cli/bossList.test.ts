import { describe, it, expect } from 'vitest';
import { createAggregator } from '../aggregator/index.js';
import { SightingFeed } from '../feed/sightingFeed.js';
import { makeSighting, settle } from '../test-helpers.js';
import { createBossListPrinter, formatBossLine, formatBossList } from './bossList.js';

describe('formatBossList', () => {
  it('prints lowest level first with the image when known', () => {
    const text = formatBossList([
      { name: 'Lvl 100 Proto Bahamut', level: 100, language: 'English' },
      { name: 'Lv60 オオゾラッコ', level: 60, language: 'Japanese', image: 'https://img/ozorotter.png' },
    ]);

    expect(text).toBe(
      '60  | Lv60 オオゾラッコ (Japanese) https://img/ozorotter.png\n' + '100 | Lvl 100 Proto Bahamut (English)\n' + '\n'
    );
  });

  it('formats a single line', () => {
    expect(formatBossLine({ name: 'Ozorotter', level: 0, language: 'English' })).toBe('0   | Ozorotter (English)');
  });
});

describe('createBossListPrinter', () => {
  it('prints the current boss list on demand', async () => {
    const feed = new SightingFeed(5);
    const { handle, driver } = createAggregator(feed, 3);
    const run = driver.run();
    feed.push(makeSighting({ bossName: 'Lvl 60 Ozorotter' }));
    await settle();

    const out: string[] = [];
    const printer = createBossListPrinter(handle, { schedule: '*/5 * * * * *', write: t => out.push(t) });
    await printer.printOnce();

    expect(out).toEqual(['60  | Lvl 60 Ozorotter (English)\n\n']);

    driver.stop();
    await run;
  });

  it('skips output once the aggregator is gone', async () => {
    const { handle, driver } = createAggregator(new SightingFeed(1), 3);
    driver.stop();

    const out: string[] = [];
    const printer = createBossListPrinter(handle, { schedule: '*/5 * * * * *', write: t => out.push(t) });
    await printer.printOnce();

    expect(out).toEqual([]);
  });

  it('rejects an invalid schedule', () => {
    const { handle } = createAggregator(new SightingFeed(1), 3);
    expect(() => createBossListPrinter(handle, { schedule: 'every now and then' })).toThrow(
      'Invalid boss list schedule: every now and then'
    );
  });
});
