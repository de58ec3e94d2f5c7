// Load environment variables before any module reads them
import 'dotenv/config';
import logger from './utils/logger';
import { initializeAPM } from './utils/apm';
import { loadConfig, type AppConfig } from './utils/config';
import { checkDatabaseConnection, disconnectDb, getDb } from './utils/db';
import { createApp } from './app';
import { ObsService } from './services/obs.service';
import { StoreAggregationEvaluator } from './services/aggregation.service';
import { RolePrivilegeChecker } from './services/privilege.service';
import { MemoryObsStore } from './repositories/memory-obs.store';
import { PostgresObsStore } from './repositories/postgres-obs.store';
import type { ObsStore } from './repositories/obs.store';

// Initialize APM (must be early in startup)
initializeAPM();

const DEFAULT_MIME_TYPES = [
  { mimeTypeId: 1, mimeType: 'text/plain', description: 'Plain text' },
  { mimeTypeId: 2, mimeType: 'application/pdf', description: 'PDF document' },
  { mimeTypeId: 3, mimeType: 'image/png', description: 'PNG image' },
  { mimeTypeId: 4, mimeType: 'image/jpeg', description: 'JPEG image' }
];

const createStore = (config: AppConfig): ObsStore => {
  if (config.store === 'postgres' && config.databaseUrl) {
    return new PostgresObsStore(getDb(config.databaseUrl, config.dbPoolMax));
  }
  logger.warn('Using in-memory observation store; data is lost on restart');
  return new MemoryObsStore({ mimeTypes: DEFAULT_MIME_TYPES });
};

const config = loadConfig();
const store = createStore(config);
const privileges = new RolePrivilegeChecker(config.rolePrivileges);
const service = new ObsService({
  store,
  evaluator: new StoreAggregationEvaluator(store),
  privileges
});

const app = createApp({
  config,
  service,
  privileges,
  checkStore: config.store === 'postgres' ? checkDatabaseConnection : undefined
});

const server = app.listen(config.port, () => {
  logger.info(`Observation service listening on http://localhost:${config.port}`, { store: config.store });
});

// Graceful shutdown handler
const gracefulShutdown = (signal: string) => {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  // Stop accepting new connections
  server.close(() => {
    logger.info('HTTP server closed');

    disconnectDb()
      .then(() => {
        logger.info('Graceful shutdown completed');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('Error during shutdown', { error });
        process.exit(1);
      });
  });

  // Force shutdown after 30 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 30000).unref();
};

// Register shutdown handlers
process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

export default app;
