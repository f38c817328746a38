import { createApp } from './app.js';
import { loadConfig } from './config/env.js';
import { closeDatabase, openDatabase } from './db/sqlite.js';
import { logger, setLogLevel } from './lib/logger.js';
import { createServices } from './services/index.js';

const config = loadConfig();
setLogLevel(config.LOG_LEVEL);

const db = openDatabase({ path: config.DATABASE_PATH, busyTimeoutMs: config.DB_BUSY_TIMEOUT_MS });
const services = createServices(db, {
  searchPageSize: config.SEARCH_PAGE_SIZE,
  idempotencyTtlHours: config.IDEMPOTENCY_TTL_HOURS,
});
const app = createApp(services);

const server = app.listen(config.PORT, () => {
  logger.info(`Clinic booking API listening on http://localhost:${config.PORT}`);
  logger.info(
    'Endpoints: GET /api/availability, POST /api/appointments, GET /api/appointments/:id, ' +
      'POST /api/appointments/:id/cancel, POST /api/tools/webhook, GET /health'
  );
});

function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down`);
  server.close((error) => {
    if (error) {
      logger.error('HTTP server did not close cleanly', { error });
    }
    closeDatabase(db);
    process.exit(error ? 1 : 0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
