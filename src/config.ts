import 'dotenv/config';
import { fileURLToPath } from 'url';
import { DEFAULT_SEED_FILE } from './activities/seed.js';

const DEFAULT_STATIC_DIR = fileURLToPath(new URL('../static', import.meta.url));

export function parsePort(value: string | undefined): number | null {
  if (value === undefined || value === '') return 8000;
  if (!/^\d+$/.test(value)) return null;
  const port = parseInt(value, 10);
  return port <= 65535 ? port : null;
}

export function validateEnv(): void {
  if (parsePort(process.env.PORT) === null) {
    console.error(`Invalid PORT "${process.env.PORT}": expected an integer between 0 and 65535`);
    console.error('Fix the value in your .env file or environment. See .env.example');
    process.exit(1);
  }
}

export const config = {
  get PORT() { return parsePort(process.env.PORT) ?? 8000; },
  get HOST() { return process.env.HOST || '0.0.0.0'; },
  get ACTIVITIES_SEED_FILE() { return process.env.ACTIVITIES_SEED_FILE || DEFAULT_SEED_FILE; },
  get STATIC_DIR() { return process.env.STATIC_DIR || DEFAULT_STATIC_DIR; },
};
