import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { CatalogConfigError } from './types.js';
import type { ActivitySeed } from './types.js';

export const DEFAULT_SEED_FILE = fileURLToPath(new URL('../../data/activities.json', import.meta.url));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(entry: Record<string, unknown>, key: string, index: number): string {
  const value = entry[key];
  if (typeof value !== 'string') {
    throw new CatalogConfigError(`activity #${index}: "${key}" must be a string`);
  }
  return value;
}

export function parseActivitySeed(raw: unknown): ActivitySeed[] {
  if (!Array.isArray(raw)) {
    throw new CatalogConfigError('seed catalog must be a JSON array');
  }

  return raw.map((entry: unknown, index): ActivitySeed => {
    if (!isRecord(entry)) {
      throw new CatalogConfigError(`activity #${index}: expected an object`);
    }
    const name = requireString(entry, 'name', index);
    if (!name.trim()) {
      throw new CatalogConfigError(`activity #${index}: "name" must not be empty`);
    }

    const max = entry.max_participants;
    if (typeof max !== 'number' || !Number.isInteger(max) || max < 1) {
      throw new CatalogConfigError(`activity "${name}": "max_participants" must be a positive integer`);
    }

    const participants = entry.participants ?? [];
    if (!Array.isArray(participants) || !participants.every((p): p is string => typeof p === 'string')) {
      throw new CatalogConfigError(`activity "${name}": "participants" must be an array of strings`);
    }

    return {
      name,
      description: requireString(entry, 'description', index),
      schedule: requireString(entry, 'schedule', index),
      maxParticipants: max,
      // duplicates in config collapse to one membership
      participants: Array.from(new Set(participants)),
    };
  });
}

export function loadActivitySeed(filePath: string = DEFAULT_SEED_FILE): ActivitySeed[] {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new CatalogConfigError(`cannot read seed catalog ${filePath}: ${msg}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new CatalogConfigError(`seed catalog ${filePath} is not valid JSON`);
  }
  return parseActivitySeed(parsed);
}
