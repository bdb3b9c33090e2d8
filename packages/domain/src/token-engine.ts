import { isTokenExpired, toEpochSeconds } from './auth';
import { AuthzError } from './errors';
import { type RevokedTokenRepository, type TokenSigner, type TransactionRunner } from './ports';
import { type MintedToken, type TokenClaims, type TokenType } from './token';

export interface TokenEngineDeps<TTx> {
  signer: TokenSigner;
  revokedTokenRepo: RevokedTokenRepository<TTx>;
  withTransaction: TransactionRunner<TTx>;
  generateId: () => string;
  accessTokenTtl: number;
  refreshTokenTtl: number;
  now?: () => Date;
}

/**
 * Mints, validates and revokes tokens. A token moves from issued to
 * expired or revoked and never back; both terminal states fail validation.
 */
export class TokenEngine<TTx> {
  private readonly now: () => Date;

  constructor(private readonly deps: TokenEngineDeps<TTx>) {
    this.now = deps.now ?? (() => new Date());
  }

  currentTime(): Date {
    return this.now();
  }

  get refreshTokenTtl(): number {
    return this.deps.refreshTokenTtl;
  }

  get accessTokenTtl(): number {
    return this.deps.accessTokenTtl;
  }

  async mintAccess(
    userId: string,
    applicationId: string,
    roles: readonly string[],
    opts: { refreshJti?: string; now?: Date } = {},
  ): Promise<MintedToken> {
    const iat = toEpochSeconds(opts.now ?? this.now());
    const claims: TokenClaims = {
      sub: userId,
      app: applicationId,
      jti: this.deps.generateId(),
      iat,
      exp: iat + this.deps.accessTokenTtl,
      type: 'access',
      roles: [...roles],
    };
    if (opts.refreshJti) claims.rid = opts.refreshJti;
    return { token: await this.deps.signer.sign(claims), claims };
  }

  async mintRefresh(userId: string, applicationId: string, now?: Date): Promise<MintedToken> {
    const iat = toEpochSeconds(now ?? this.now());
    const claims: TokenClaims = {
      sub: userId,
      app: applicationId,
      jti: this.deps.generateId(),
      iat,
      exp: iat + this.deps.refreshTokenTtl,
      type: 'refresh',
    };
    return { token: await this.deps.signer.sign(claims), claims };
  }

  async validate(token: string, expectedType: TokenType): Promise<TokenClaims> {
    let claims: TokenClaims;
    try {
      claims = await this.deps.signer.verify(token);
    } catch {
      throw new AuthzError('TOKEN_INVALID', 'Invalid token', { reason: 'signature' });
    }

    if (isTokenExpired(claims.exp, this.now())) {
      throw new AuthzError('TOKEN_INVALID', 'Invalid token', { reason: 'expired' });
    }
    if (claims.type !== expectedType) {
      throw new AuthzError('TOKEN_INVALID', 'Invalid token', { reason: 'type' });
    }

    const revoked = await this.deps.withTransaction((tx) =>
      this.deps.revokedTokenRepo.isRevoked(tx, claims.jti),
    );
    if (revoked) {
      throw new AuthzError('TOKEN_INVALID', 'Invalid token', { reason: 'revoked' });
    }

    return claims;
  }

  /**
   * Records the jti as revoked until its own expiry. Already-expired tokens
   * are skipped since validation rejects them anyway.
   */
  async revoke(jti: string, expSeconds: number): Promise<boolean> {
    const now = this.now();
    if (isTokenExpired(expSeconds, now)) return false;

    return this.deps.withTransaction((tx) =>
      this.deps.revokedTokenRepo.insert(tx, {
        jti,
        expiresAt: new Date(expSeconds * 1000),
        revokedAt: now,
      }),
    );
  }

  async pruneExpired(now?: Date): Promise<number> {
    const at = now ?? this.now();
    return this.deps.withTransaction((tx) => this.deps.revokedTokenRepo.deleteExpired(tx, at));
  }
}
