/**
 * Load clinics, doctors and the next weeks of slots into the database.
 * Run: npm run seed [-- path/to/catalog.json]
 */

import fs from 'fs';
import { fileURLToPath } from 'url';
import { loadConfig } from '../src/config/env.js';
import { catalogSchema, seedCatalog } from '../src/db/seed.js';
import { closeDatabase, openDatabase } from '../src/db/sqlite.js';
import { logger, setLogLevel } from '../src/lib/logger.js';

const defaultCatalog = fileURLToPath(new URL('../data/seed-catalog.json', import.meta.url));

function main(): void {
  const config = loadConfig();
  setLogLevel(config.LOG_LEVEL);

  const catalogPath = process.argv[2] ?? defaultCatalog;
  const parsed = catalogSchema.safeParse(JSON.parse(fs.readFileSync(catalogPath, 'utf8')));
  if (!parsed.success) {
    logger.error(`Invalid catalog: ${catalogPath}`, { issues: parsed.error.issues });
    process.exitCode = 1;
    return;
  }

  const db = openDatabase({ path: config.DATABASE_PATH, busyTimeoutMs: config.DB_BUSY_TIMEOUT_MS });
  try {
    const summary = seedCatalog(db, parsed.data);
    logger.info(
      `Seeded ${summary.clinics} clinic(s), ${summary.doctors} doctor(s), ${summary.slots} new slot(s)`
    );
  } finally {
    closeDatabase(db);
  }
}

main();
