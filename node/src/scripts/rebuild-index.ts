/**
 * Explicit index rebuild: clears everything, re-ingests the catalog, verifies
 * that the store and both indexes agree, then writes a fresh snapshot.
 * This is the only way to recover from a corrupted snapshot.
 *
 *   CATALOG_PATH=node/data/catalog.sample.json SNAPSHOT_PATH=.data/index.json npm run rebuild-index
 */
// First import: .env must be loaded before any module reads process.env
import 'dotenv/config';

import { loadAppConfig } from '@/config/app.config';
import { createEngine } from '@/services/engine';
import { loadCatalog } from '@/services/catalog-loader';
import { saveSnapshot } from '@/services/index-snapshot';
import { ConfigError, errorMessage } from '@/services/errors';
import { logger, setLogLevel } from '@/services/logger';

async function main(): Promise<number> {
  const config = loadAppConfig();
  setLogLevel(config.logLevel);
  if (!config.catalogPath || !config.snapshotPath) {
    throw new ConfigError(['CATALOG_PATH and SNAPSHOT_PATH are both required to rebuild the index']);
  }

  const engine = await createEngine(config);
  engine.pipeline.clear();

  const raws = await loadCatalog(config.catalogPath);
  const outcomes = await engine.pipeline.ingestBatch(raws);
  const report = engine.pipeline.verifyConsistency();
  if (!report.consistent) {
    logger.error('rebuild:inconsistent', { ...report });
    return 1;
  }

  await saveSnapshot(config.snapshotPath, engine.store.all(), engine.embedder.dimension);
  const failed = outcomes.filter((o) => o.state === 'failed').length;
  const skipped = outcomes.filter((o) => o.state === 'skipped').length;
  logger.info('rebuild:complete', {
    documents: engine.store.size,
    failed,
    skipped,
    snapshot: config.snapshotPath,
  });
  return failed > 0 ? 2 : 0;
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    logger.fatal('rebuild:failed', { err: errorMessage(err) });
    process.exit(1);
  },
);
