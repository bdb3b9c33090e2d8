import { type PoolClient } from 'pg';
import {
  AuthzService,
  DirectoryService,
  PermissionCache,
  PermissionResolver,
  TokenEngine,
  type ApplicationRepository,
  type GrantRepository,
  type Logger,
  type PasswordHasher,
  type RevokedTokenRepository,
  type RoleRepository,
  type StatsRepository,
  type SuperUserCredentials,
  type TokenSigner,
  type TransactionRunner,
  type UserRepository,
} from '@tollgate/domain';
import {
  PgApplicationRepository,
  PgGrantRepository,
  PgRevokedTokenRepository,
  PgRoleRepository,
  PgStatsRepository,
  PgUserRepository,
  withTransaction,
  type TableLayout,
} from '@tollgate/db';
import { generateId as defaultGenerateId } from '@tollgate/shared';

/** Every repository the services need, sharing one transaction type. */
export interface StoreBundle<TTx> {
  applications: ApplicationRepository<TTx>;
  users: UserRepository<TTx>;
  roles: RoleRepository<TTx>;
  grants: GrantRepository<TTx>;
  revokedTokens: RevokedTokenRepository<TTx>;
  stats: StatsRepository<TTx>;
  withTransaction: TransactionRunner<TTx>;
}

export interface ServiceOptions {
  signer: TokenSigner;
  passwordHasher: PasswordHasher;
  accessTokenTtl: number;
  refreshTokenTtl: number;
  superUser: SuperUserCredentials | null;
  dummyPasswordHash: string;
  permissionCache: boolean;
  logger: Logger;
  generateId?: () => string;
  now?: () => Date;
}

export interface Services<TTx> {
  authzService: AuthzService<TTx>;
  directoryService: DirectoryService<TTx>;
  permissionResolver: PermissionResolver<TTx>;
}

export function createPgStore(layout: TableLayout): StoreBundle<PoolClient> {
  const { tables } = layout;
  return {
    applications: new PgApplicationRepository(tables),
    users: new PgUserRepository(tables),
    roles: new PgRoleRepository(tables),
    grants: new PgGrantRepository(tables),
    revokedTokens: new PgRevokedTokenRepository(tables),
    stats: new PgStatsRepository(tables),
    withTransaction,
  };
}

export function createServices<TTx>(store: StoreBundle<TTx>, options: ServiceOptions): Services<TTx> {
  const generateId = options.generateId ?? defaultGenerateId;

  const tokenEngine = new TokenEngine({
    signer: options.signer,
    revokedTokenRepo: store.revokedTokens,
    withTransaction: store.withTransaction,
    generateId,
    accessTokenTtl: options.accessTokenTtl,
    refreshTokenTtl: options.refreshTokenTtl,
    now: options.now,
  });

  const permissionResolver = new PermissionResolver({
    grantRepo: store.grants,
    withTransaction: store.withTransaction,
    cache: options.permissionCache ? new PermissionCache() : undefined,
  });

  const authzService = new AuthzService({
    applicationRepo: store.applications,
    userRepo: store.users,
    passwordHasher: options.passwordHasher,
    tokenEngine,
    permissionResolver,
    withTransaction: store.withTransaction,
    generateId,
    logger: options.logger,
    superUser: options.superUser,
    dummyPasswordHash: options.dummyPasswordHash,
  });

  const directoryService = new DirectoryService({
    applicationRepo: store.applications,
    userRepo: store.users,
    roleRepo: store.roles,
    grantRepo: store.grants,
    statsRepo: store.stats,
    passwordHasher: options.passwordHasher,
    permissionResolver,
    withTransaction: store.withTransaction,
    generateId,
    reservedLogin: options.superUser?.login ?? null,
  });

  return { authzService, directoryService, permissionResolver };
}

/** Hashes the configured super-user password once at startup. */
export async function loadSuperUser(
  config: { SUPER_USER_LOGIN?: string; SUPER_USER_PASSWORD?: string },
  passwordHasher: PasswordHasher,
): Promise<SuperUserCredentials | null> {
  if (config.SUPER_USER_LOGIN === undefined || config.SUPER_USER_PASSWORD === undefined) {
    return null;
  }
  return {
    login: config.SUPER_USER_LOGIN,
    passwordHash: await passwordHasher.hash(config.SUPER_USER_PASSWORD),
  };
}

/** Digest of a random password, computed once at startup and verified against for unknown logins. */
export function hashDummyPassword(passwordHasher: PasswordHasher): Promise<string> {
  return passwordHasher.hash(defaultGenerateId());
}
