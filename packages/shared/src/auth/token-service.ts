import { SignJWT, jwtVerify, type JWTPayload } from 'jose';
import { z } from 'zod';
import { type TokenClaims, type TokenSigner } from '@tollgate/domain';
import { type SigningKeyRing } from '../config';

interface JwtKey {
  kid: string;
  secret: Uint8Array;
}

interface KeyState {
  active: JwtKey;
  keys: ReadonlyMap<string, JwtKey>;
}

interface TokenServiceConfig {
  ring: SigningKeyRing;
  issuer?: string;
  now?: () => Date;
}

const TokenClaimsSchema = z.object({
  sub: z.string().min(1),
  app: z.string().min(1),
  jti: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
  type: z.enum(['access', 'refresh']),
  roles: z.array(z.string()).optional(),
  rid: z.string().min(1).optional(),
});

function buildKeyState(ring: SigningKeyRing): KeyState {
  const keys = new Map<string, JwtKey>();
  for (const key of ring.keys) {
    keys.set(key.kid, { kid: key.kid, secret: new TextEncoder().encode(key.secret) });
  }
  const active = keys.get(ring.activeKid);
  if (!active) {
    throw new Error(`Active JWT key '${ring.activeKid}' not found in keys`);
  }
  return { active, keys };
}

/**
 * HS256 signer over a kid-indexed key ring. Any key in the ring verifies;
 * only the active one signs.
 */
export class JoseTokenService implements TokenSigner {
  private state: KeyState;
  private readonly issuer: string;
  private readonly now: () => Date;

  constructor(config: TokenServiceConfig) {
    this.state = buildKeyState(config.ring);
    this.issuer = config.issuer ?? 'tollgate';
    this.now = config.now ?? (() => new Date());
  }

  get activeKid(): string {
    return this.state.active.kid;
  }

  /** Replaces the whole ring at once; a bad ring leaves the current one in place. */
  rotateKeys(ring: SigningKeyRing): void {
    this.state = buildKeyState(ring);
  }

  async sign(claims: TokenClaims): Promise<string> {
    const { active } = this.state;
    const payload: JWTPayload = { app: claims.app, type: claims.type };
    if (claims.roles) payload.roles = claims.roles;
    if (claims.rid) payload.rid = claims.rid;

    return new SignJWT(payload)
      .setProtectedHeader({ alg: 'HS256', kid: active.kid })
      .setSubject(claims.sub)
      .setJti(claims.jti)
      .setIssuer(this.issuer)
      .setIssuedAt(claims.iat)
      .setExpirationTime(claims.exp)
      .sign(active.secret);
  }

  async verify(token: string): Promise<TokenClaims> {
    const { keys } = this.state;
    const { payload } = await jwtVerify(
      token,
      (header) => {
        const key = header.kid ? keys.get(header.kid) : undefined;
        if (!key) throw new Error('Unknown signing key');
        return key.secret;
      },
      {
        issuer: this.issuer,
        algorithms: ['HS256'],
        currentDate: this.now(),
      },
    );

    const parsed = TokenClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Error('Malformed token claims');
    }
    return parsed.data;
  }
}
