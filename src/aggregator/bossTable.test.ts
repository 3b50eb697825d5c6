import { describe, it, expect } from 'vitest';
import { shareSighting } from '../domain/sighting.js';
import { makeSighting } from '../test-helpers.js';
import { BossTable } from './bossTable.js';

describe('BossTable', () => {
  it('creates an entry on the first sighting of a boss', () => {
    const table = new BossTable(5);
    const s = shareSighting(makeSighting({ bossName: 'Lv60 オオゾラッコ', language: 'Japanese', createdAt: 1000 }));

    table.handleSighting(s);

    expect(table.listBosses()).toEqual([{ name: 'Lv60 オオゾラッコ', level: 60, language: 'Japanese' }]);
    expect(table.lastSeen('Lv60 オオゾラッコ')).toBe(1000);
    expect(table.recentHistory('Lv60 オオゾラッコ')).toEqual([s]);
  });

  it('keeps one entry per boss and tracks the latest sighting time', () => {
    const table = new BossTable(10);
    for (const createdAt of [1000, 2000, 3000, 4000]) {
      table.handleSighting(shareSighting(makeSighting({ bossName: 'Lvl 60 Ozorotter', createdAt })));
    }

    expect(table.listBosses()).toHaveLength(1);
    expect(table.lastSeen('Lvl 60 Ozorotter')).toBe(4000);
    expect(table.recentHistory('Lvl 60 Ozorotter')).toHaveLength(4);
  });

  it('evicts the oldest sighting once history is full', () => {
    const table = new BossTable(2);
    const [s1, s2, s3] = [1, 2, 3].map(n => shareSighting(makeSighting({ bossName: 'X', createdAt: n })));
    [s1, s2, s3].forEach(s => s && table.handleSighting(s));

    const history = table.recentHistory('X');
    expect(history).toHaveLength(2);
    expect(history).toContain(s2);
    expect(history).toContain(s3);
    expect(history).not.toContain(s1);
  });

  it('attaches the first image seen and never replaces it', () => {
    const table = new BossTable(5);
    const name = 'Lvl 100 Proto Bahamut';

    table.handleSighting(shareSighting(makeSighting({ bossName: name })));
    expect(table.listBosses()[0]?.image).toBeUndefined();

    table.handleSighting(shareSighting(makeSighting({ bossName: name, image: 'https://img/a.png' })));
    table.handleSighting(shareSighting(makeSighting({ bossName: name, image: 'https://img/b.png' })));
    table.handleSighting(shareSighting(makeSighting({ bossName: name })));

    expect(table.listBosses()[0]?.image).toBe('https://img/a.png');
  });

  it('takes the image from the very first sighting', () => {
    const table = new BossTable(5);
    table.handleSighting(shareSighting(makeSighting({ bossName: 'Y', image: 'https://img/first.png' })));
    table.handleSighting(shareSighting(makeSighting({ bossName: 'Y', image: 'https://img/second.png' })));
    expect(table.listBosses()[0]?.image).toBe('https://img/first.png');
  });

  it('returns an empty history for an unknown boss', () => {
    expect(new BossTable(5).recentHistory('nobody')).toEqual([]);
  });

  it('lists one record per distinct boss', () => {
    const table = new BossTable(3);
    const names = ['A', 'B', 'C', 'A', 'B', 'A', 'D'];
    names.forEach(bossName => table.handleSighting(shareSighting(makeSighting({ bossName }))));

    expect(table.listBosses().map(b => b.name).sort()).toEqual(['A', 'B', 'C', 'D']);
    expect(table.stats()).toEqual({ bosses: 4, sightings: 7 });
  });

  it('records a replayed sighting twice', () => {
    const table = new BossTable(5);
    const s = shareSighting(makeSighting({ bossName: 'Z' }));
    table.handleSighting(s);
    table.handleSighting(s);

    expect(table.recentHistory('Z')).toEqual([s, s]);
    expect(table.stats().sightings).toBe(2);
  });

  it('falls back to level 0 and honours an injected parser', () => {
    const table = new BossTable(1);
    table.handleSighting(shareSighting(makeSighting({ bossName: 'Ozorotter' })));
    expect(table.listBosses()[0]?.level).toBe(0);

    const custom = new BossTable(1, () => 99);
    custom.handleSighting(shareSighting(makeSighting({ bossName: 'Ozorotter' })));
    expect(custom.listBosses()[0]?.level).toBe(99);
  });

  it('hands out copies of boss metadata', () => {
    const table = new BossTable(1);
    table.handleSighting(shareSighting(makeSighting({ bossName: 'W' })));

    const [copy] = table.listBosses();
    if (copy) copy.image = 'https://img/tampered.png';

    expect(table.listBosses()[0]?.image).toBeUndefined();
  });

  it('keeps metadata but no history at size 0', () => {
    const table = new BossTable(0);
    table.handleSighting(shareSighting(makeSighting({ bossName: 'V', createdAt: 10 })));

    expect(table.listBosses()).toHaveLength(1);
    expect(table.lastSeen('V')).toBe(10);
    expect(table.recentHistory('V')).toEqual([]);
  });
});
