import { canLogin, isSuperUser, SUPER_USER_ID } from './auth';
import { AuthzError } from './errors';
import { hasPermission, type PermissionSet } from './permissions';
import { type PermissionResolver } from './permission-resolver';
import {
  type ApplicationRepository,
  type Logger,
  type PasswordHasher,
  type TransactionRunner,
  type UserRepository,
} from './ports';
import { type TokenEngine } from './token-engine';
import { type TokenClaims, type TokenPair } from './token';

export interface SuperUserCredentials {
  login: string;
  /** Digest of the configured password, produced by the same hasher. */
  passwordHash: string;
}

export interface AuthzServiceDeps<TTx> {
  applicationRepo: ApplicationRepository<TTx>;
  userRepo: UserRepository<TTx>;
  passwordHasher: PasswordHasher;
  tokenEngine: TokenEngine<TTx>;
  permissionResolver: PermissionResolver<TTx>;
  withTransaction: TransactionRunner<TTx>;
  generateId: () => string;
  logger: Logger;
  superUser: SuperUserCredentials | null;
  /** Digest of a throwaway password, verified against when the login is unknown. */
  dummyPasswordHash: string;
}

export class AuthzService<TTx> {
  constructor(private readonly deps: AuthzServiceDeps<TTx>) {}

  async login(input: { applicationId: string; login: string; password: string }): Promise<TokenPair> {
    const { passwordHasher, superUser } = this.deps;

    if (superUser && input.login === superUser.login) {
      const valid = await passwordHasher.verify(input.password, superUser.passwordHash);
      if (!valid) throw this.invalidCredentials('super-user password mismatch', input);
      return this.issueTokens(SUPER_USER_ID, input.applicationId, []);
    }

    const { application, user } = await this.deps.withTransaction(async (tx) => {
      const application = await this.deps.applicationRepo.findById(tx, input.applicationId);
      const user = application
        ? await this.deps.userRepo.findByLogin(tx, application.id, input.login)
        : null;
      return { application, user };
    });

    // Verify even when the user is missing so every failure costs one hash.
    const digest = user?.passwordHash ?? this.deps.dummyPasswordHash;
    const valid = await passwordHasher.verify(input.password, digest);

    if (!application) throw this.invalidCredentials('unknown application', input);
    if (!user) throw this.invalidCredentials('unknown user', input);
    if (!canLogin(user, application)) throw this.invalidCredentials('user or application disabled', input);
    if (!valid) throw this.invalidCredentials('password mismatch', input);

    const roles = await this.deps.permissionResolver.resolveRoleNames(user.id, application.id);
    this.deps.logger.info({ userId: user.id, applicationId: application.id }, 'Login succeeded');
    return this.issueTokens(user.id, application.id, roles);
  }

  /**
   * Exchanges a refresh token for a new pair. Refresh tokens rotate on use:
   * the presented jti is revoked, and a replay or a concurrent second use
   * loses the revocation insert and fails.
   */
  async refresh(refreshToken: string): Promise<TokenPair> {
    const { tokenEngine, permissionResolver } = this.deps;
    const claims = await tokenEngine.validate(refreshToken, 'refresh');

    if (!isSuperUser(claims.sub)) {
      const active = await this.deps.withTransaction(async (tx) => {
        const application = await this.deps.applicationRepo.findById(tx, claims.app);
        const user = await this.deps.userRepo.findById(tx, claims.app, claims.sub);
        return canLogin(user, application);
      });
      if (!active) {
        throw new AuthzError('TOKEN_INVALID', 'Invalid token', { reason: 'subject inactive' });
      }
    }

    const won = await tokenEngine.revoke(claims.jti, claims.exp);
    if (!won) {
      this.deps.logger.warn({ jti: claims.jti, userId: claims.sub }, 'Refresh token reuse detected');
      throw new AuthzError('TOKEN_INVALID', 'Invalid token', { reason: 'reused' });
    }

    const roles = await permissionResolver.resolveRoleNames(claims.sub, claims.app);
    return this.issueTokens(claims.sub, claims.app, roles);
  }

  async authorize(
    accessToken: string,
    requiredPermission: string,
    applicationId?: string,
  ): Promise<TokenClaims> {
    const claims = await this.deps.tokenEngine.validate(accessToken, 'access');
    if (isSuperUser(claims.sub)) return claims;

    const target = applicationId ?? claims.app;
    if (target !== claims.app) {
      throw this.permissionDenied(claims, requiredPermission, target);
    }

    const permissions = await this.deps.permissionResolver.resolve(claims.sub, claims.app);
    if (!hasPermission(permissions, requiredPermission)) {
      throw this.permissionDenied(claims, requiredPermission, target);
    }
    return claims;
  }

  async requireSuperUser(accessToken: string): Promise<TokenClaims> {
    const claims = await this.deps.tokenEngine.validate(accessToken, 'access');
    if (!isSuperUser(claims.sub)) {
      throw this.permissionDenied(claims, 'super-user', claims.app);
    }
    return claims;
  }

  /** Validated claims plus the permissions currently resolved for them. */
  async inspect(accessToken: string): Promise<{ claims: TokenClaims; permissions: PermissionSet }> {
    const claims = await this.deps.tokenEngine.validate(accessToken, 'access');
    const permissions = await this.deps.permissionResolver.resolve(claims.sub, claims.app);
    return { claims, permissions };
  }

  async logout(accessToken: string): Promise<void> {
    const { tokenEngine } = this.deps;
    const claims = await tokenEngine.validate(accessToken, 'access');

    await tokenEngine.revoke(claims.jti, claims.exp);
    if (claims.rid) {
      // Paired refresh token was minted in the same second as this one.
      await tokenEngine.revoke(claims.rid, claims.iat + tokenEngine.refreshTokenTtl);
    }
    this.deps.logger.info({ userId: claims.sub, applicationId: claims.app }, 'Logged out');
  }

  async pruneRevokedTokens(): Promise<number> {
    return this.deps.tokenEngine.pruneExpired();
  }

  private async issueTokens(userId: string, applicationId: string, roles: string[]): Promise<TokenPair> {
    const { tokenEngine } = this.deps;
    const now = tokenEngine.currentTime();
    const refresh = await tokenEngine.mintRefresh(userId, applicationId, now);
    const access = await tokenEngine.mintAccess(userId, applicationId, roles, {
      refreshJti: refresh.claims.jti,
      now,
    });
    return {
      accessToken: access.token,
      refreshToken: refresh.token,
      expiresIn: tokenEngine.accessTokenTtl,
    };
  }

  private invalidCredentials(
    reason: string,
    input: { applicationId: string; login: string },
  ): AuthzError {
    const traceId = this.deps.generateId();
    this.deps.logger.warn(
      { traceId, reason, applicationId: input.applicationId, login: input.login },
      'Login rejected',
    );
    return new AuthzError('INVALID_CREDENTIALS', 'Invalid credentials', { traceId });
  }

  private permissionDenied(claims: TokenClaims, permission: string, applicationId: string): AuthzError {
    const traceId = this.deps.generateId();
    this.deps.logger.warn(
      { traceId, userId: claims.sub, tokenApplicationId: claims.app, applicationId, permission },
      'Permission denied',
    );
    return new AuthzError('PERMISSION_DENIED', 'Permission denied', { traceId });
  }
}
