import {
  WorkerConfigSchema,
  createLogger,
  loadLayeredConfig,
  setLogLevel,
  startHealthBeat,
} from '@tollgate/shared';
import {
  PgRevokedTokenRepository,
  closePool,
  initPool,
  resolveTableLayout,
  withTransaction,
} from '@tollgate/db';
import { runPruneRevokedTokensJob } from './jobs/prune-revoked-tokens';

const logger = createLogger({ name: 'worker' });

async function main() {
  const config = loadLayeredConfig(WorkerConfigSchema);
  setLogLevel(config.LOG_LEVEL);

  initPool({ connectionString: config.DATABASE_URL });
  const layout = resolveTableLayout({ prefix: config.TABLE_PREFIX, schema: config.DB_SCHEMA });
  const revokedTokenRepo = new PgRevokedTokenRepository(layout.tables);

  const healthBeat = startHealthBeat({
    path: config.WORKER_HEALTHCHECK_PATH,
    onError: (err) => {
      logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Health file write failed');
    },
  });

  const pruneLogger = logger.child({ job: 'prune-revoked-tokens' });
  let pruning = false;
  const pruneInterval = setInterval(() => {
    if (pruning) return;
    pruning = true;
    runPruneRevokedTokensJob({ revokedTokenRepo, withTransaction, logger: pruneLogger })
      .catch(logJobError('prune-revoked-tokens'))
      .finally(() => {
        pruning = false;
      });
  }, config.PRUNE_INTERVAL_MS);

  logger.info({ pruneIntervalMs: config.PRUNE_INTERVAL_MS }, 'Worker started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down worker');
    healthBeat.stop();
    clearInterval(pruneInterval);
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

function logJobError(jobName: string) {
  return (err: unknown) => {
    logger.error(
      { err: err instanceof Error ? err.message : String(err), job: jobName },
      'Job failed',
    );
  };
}

main().catch((err: unknown) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start worker');
  process.exit(1);
});
