// First import: .env must be loaded before any module reads process.env
import 'dotenv/config';

import { loadAppConfig, type AppConfig } from '@/config/app.config';
import { createEngine, type Engine } from '@/services/engine';
import { loadCatalog } from '@/services/catalog-loader';
import { loadSnapshot, saveSnapshot } from '@/services/index-snapshot';
import { errorMessage } from '@/services/errors';
import { logger, setLogLevel } from '@/services/logger';
import { createApp } from './app';
import {
  onShutdown,
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from '@/stability/errorHandlers';

/** Snapshot first; the catalog is ingested only when there is no snapshot to restore. */
async function warmIndex(engine: Engine, config: AppConfig): Promise<void> {
  if (config.snapshotPath) {
    const documents = await loadSnapshot(config.snapshotPath, engine.embedder.dimension);
    if (documents) {
      const report = await engine.pipeline.restore(documents);
      engine.health.assertServing();
      logger.info('startup:snapshot_restored', { documents: report.documents });
      return;
    }
  }
  if (config.catalogPath) {
    const raws = await loadCatalog(config.catalogPath);
    await engine.pipeline.ingestBatch(raws);
  }
}

const startServer = async () => {
  setupUnhandledRejectionHandler();
  setupUncaughtExceptionHandler();
  setupGracefulShutdown();

  try {
    const config = loadAppConfig();
    setLogLevel(config.logLevel);
    const engine = await createEngine(config);
    await warmIndex(engine, config);

    const { snapshotPath } = config;
    if (snapshotPath) {
      onShutdown(async () => {
        if (engine.health.isCorrupted()) return;
        await saveSnapshot(snapshotPath, engine.store.all(), engine.embedder.dimension);
      });
    }

    const app = createApp(engine, {
      nodeEnv: config.nodeEnv,
      corsOrigins: process.env.CORS_ORIGIN?.split(','),
    });
    const server = app.listen(config.port, () => {
      logger.info('startup:listening', {
        port: config.port,
        environment: config.nodeEnv,
        documents: engine.store.size,
      });
    });
    setServerInstance(server);
  } catch (error) {
    // TaxonomyConfigError, ConfigError and IndexCorruptionError all end up here
    logger.fatal('startup:failed', { err: errorMessage(error) });
    process.exit(1);
  }
};

void startServer();
