import { CatalogConfigError } from './types.js';
import type { ActivityRecord, ActivitySeed, ActivitySnapshot } from './types.js';

function toRecord(seed: ActivitySeed): ActivityRecord {
  return {
    name: seed.name,
    description: seed.description,
    schedule: seed.schedule,
    maxParticipants: seed.maxParticipants,
    participants: new Set(seed.participants),
  };
}

function toSnapshot(record: ActivityRecord): ActivitySnapshot {
  return {
    name: record.name,
    description: record.description,
    schedule: record.schedule,
    maxParticipants: record.maxParticipants,
    participants: Array.from(record.participants),
  };
}

/**
 * In-memory catalog of activities, keyed by exact name.
 * Keys are fixed at construction; only participant sets change afterwards.
 */
export class ActivityCatalog {
  private activities = new Map<string, ActivityRecord>();

  constructor(seed: ActivitySeed[]) {
    this.populate(seed);
  }

  get size(): number {
    return this.activities.size;
  }

  /** Snapshot of every activity in seed order. Mutating it does not touch the catalog. */
  list(): ReadonlyMap<string, ActivitySnapshot> {
    const view = new Map<string, ActivitySnapshot>();
    for (const [name, record] of this.activities) {
      view.set(name, toSnapshot(record));
    }
    return view;
  }

  get(name: string): ActivityRecord | undefined {
    return this.activities.get(name);
  }

  /**
   * Replace the whole catalog with `seed`. Test isolation only, the HTTP
   * layer has no route to it.
   */
  reset(seed: ActivitySeed[]): void {
    this.populate(seed);
    console.log(`[Catalog] Reset to ${this.activities.size} activities`);
  }

  private populate(seed: ActivitySeed[]): void {
    const next = new Map<string, ActivityRecord>();
    for (const entry of seed) {
      if (next.has(entry.name)) {
        throw new CatalogConfigError(`duplicate activity name "${entry.name}"`);
      }
      next.set(entry.name, toRecord(entry));
    }
    this.activities = next;
  }
}
