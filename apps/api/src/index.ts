import {
  ApiConfigSchema,
  Argon2PasswordHasher,
  JoseTokenService,
  createLogger,
  loadLayeredConfig,
  resolveSigningKeys,
  setLogLevel,
} from '@tollgate/shared';
import { closePool, initPool, resolveTableLayout } from '@tollgate/db';
import { buildServer } from './server';
import { createPgStore, createServices, hashDummyPassword, loadSuperUser } from './services';

const logger = createLogger({ name: 'api' });

async function main() {
  const config = loadLayeredConfig(ApiConfigSchema);
  setLogLevel(config.LOG_LEVEL);

  const signer = new JoseTokenService({
    ring: resolveSigningKeys(config),
    issuer: config.TOKEN_ISSUER,
  });
  const passwordHasher = new Argon2PasswordHasher({
    memoryCost: config.PASSWORD_HASH_MEMORY_COST,
    timeCost: config.PASSWORD_HASH_TIME_COST,
    parallelism: config.PASSWORD_HASH_PARALLELISM,
  });

  initPool({ connectionString: config.DATABASE_URL });
  const layout = resolveTableLayout({ prefix: config.TABLE_PREFIX, schema: config.DB_SCHEMA });

  const { authzService, directoryService } = createServices(createPgStore(layout), {
    signer,
    passwordHasher,
    accessTokenTtl: config.TOKEN_TTL_ACCESS,
    refreshTokenTtl: config.TOKEN_TTL_REFRESH,
    superUser: await loadSuperUser(config, passwordHasher),
    dummyPasswordHash: await hashDummyPassword(passwordHasher),
    permissionCache: config.PERMISSION_CACHE_ENABLED,
    logger: logger.child({ component: 'authz' }),
  });

  const app = buildServer({
    authzService,
    directoryService,
    loginRateLimit: {
      windowMs: config.LOGIN_RATE_LIMIT_WINDOW_MS,
      maxRequests: config.LOGIN_RATE_LIMIT_MAX,
    },
  });

  await app.listen({ host: config.API_HOST, port: config.API_PORT });
  logger.info({ port: config.API_PORT, activeKid: signer.activeKid }, 'API server started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down API server');
    await app.close();
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

main().catch((err: unknown) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start API');
  process.exit(1);
});
