import { config, validateEnv } from './config.js';
import { ActivityCatalog } from './activities/catalog.js';
import { EnrollmentEngine } from './activities/enrollment.js';
import { loadActivitySeed } from './activities/seed.js';
import { createActivitiesServer } from './api/server.js';

function main(): void {
  validateEnv();

  let catalog: ActivityCatalog;
  try {
    catalog = new ActivityCatalog(loadActivitySeed(config.ACTIVITIES_SEED_FILE));
  } catch (error) {
    console.error('[FATAL] Could not load activity catalog:', error);
    process.exit(1);
  }
  console.log(`[Init] Loaded ${catalog.size} activities from ${config.ACTIVITIES_SEED_FILE}`);

  const engine = new EnrollmentEngine(catalog);
  const server = createActivitiesServer({ engine, staticDir: config.STATIC_DIR });

  const shutdown = (signal: string): void => {
    console.log(`\n[Shutdown] ${signal} received, closing server. Enrollments are not persisted.`);
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  server.listen(config.PORT, config.HOST, () => {
    console.log(`[Server] Activities API listening on http://${config.HOST}:${config.PORT}`);
  });
}

main();
