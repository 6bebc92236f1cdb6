import { describe, it, expect } from 'vitest';
import { ActivityCatalog } from './catalog.js';
import { CatalogConfigError } from './types.js';
import type { ActivitySeed } from './types.js';
import { loadActivitySeed } from './seed.js';

// ─── Helper ─────────────────────────────────────────────────────────────────

function makeSeed(): ActivitySeed[] {
  return [
    { name: 'Robotics', description: 'Build robots', schedule: 'Mondays', maxParticipants: 4, participants: ['ana', 'ben'] },
    { name: 'Choir', description: 'Sing together', schedule: 'Fridays', maxParticipants: 30, participants: [] },
  ];
}

// ─── list ───────────────────────────────────────────────────────────────────

describe('list', () => {
  it('returns every seeded activity with matching attributes', () => {
    const catalog = new ActivityCatalog(makeSeed());
    const view = catalog.list();

    expect(view.size).toBe(2);
    expect(view.get('Robotics')).toEqual({
      name: 'Robotics',
      description: 'Build robots',
      schedule: 'Mondays',
      maxParticipants: 4,
      participants: ['ana', 'ben'],
    });
    expect(view.get('Choir')?.participants).toEqual([]);
  });

  it('keeps seed order', () => {
    const catalog = new ActivityCatalog(makeSeed());
    expect(Array.from(catalog.list().keys())).toEqual(['Robotics', 'Choir']);
  });

  it('returns a copy that cannot change the catalog', () => {
    const catalog = new ActivityCatalog(makeSeed());
    const view = catalog.list();
    view.get('Robotics')?.participants.push('intruder');

    expect(catalog.get('Robotics')?.participants.has('intruder')).toBe(false);
    expect(catalog.list().get('Robotics')?.participants).toEqual(['ana', 'ben']);
  });

  it('matches the bundled seed of 9 activities', () => {
    const catalog = new ActivityCatalog(loadActivitySeed());
    const view = catalog.list();

    expect(view.size).toBe(9);
    expect(view.get('Chess Club')?.participants).toEqual(['michael@mergington.edu', 'daniel@mergington.edu']);
    expect(view.get('Programming Class')?.maxParticipants).toBe(20);
  });
});

// ─── get ────────────────────────────────────────────────────────────────────

describe('get', () => {
  it('finds an activity by exact name', () => {
    const catalog = new ActivityCatalog(makeSeed());
    expect(catalog.get('Choir')?.schedule).toBe('Fridays');
  });

  it('returns undefined for unknown or differently-cased names', () => {
    const catalog = new ActivityCatalog(makeSeed());
    expect(catalog.get('Fake Activity')).toBeUndefined();
    expect(catalog.get('choir')).toBeUndefined();
  });
});

// ─── reset / construction ───────────────────────────────────────────────────

describe('reset', () => {
  it('restores the seed after participants changed', () => {
    const seed = makeSeed();
    const catalog = new ActivityCatalog(seed);
    catalog.get('Robotics')?.participants.add('cleo');
    catalog.get('Robotics')?.participants.delete('ana');

    catalog.reset(seed);

    expect(catalog.list().get('Robotics')?.participants).toEqual(['ana', 'ben']);
  });

  it('does not share participant sets with the seed arrays', () => {
    const seed = makeSeed();
    const catalog = new ActivityCatalog(seed);
    catalog.get('Choir')?.participants.add('dev');

    expect(seed[1].participants).toEqual([]);
  });

  it('replaces the key set entirely', () => {
    const catalog = new ActivityCatalog(makeSeed());
    catalog.reset([{ name: 'Drama', description: 'Plays', schedule: 'Tuesdays', maxParticipants: 10, participants: [] }]);

    expect(catalog.size).toBe(1);
    expect(catalog.get('Robotics')).toBeUndefined();
  });

  it('rejects duplicate activity names', () => {
    const seed = [...makeSeed(), makeSeed()[0]];
    expect(() => new ActivityCatalog(seed)).toThrow(CatalogConfigError);
    expect(() => new ActivityCatalog(seed)).toThrow('duplicate activity name "Robotics"');
  });

  it('keeps the previous contents when a reset seed is invalid', () => {
    const catalog = new ActivityCatalog(makeSeed());
    expect(() => catalog.reset([...makeSeed(), makeSeed()[1]])).toThrow(CatalogConfigError);
    expect(catalog.size).toBe(2);
  });
});
