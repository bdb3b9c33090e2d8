export type TokenType = 'access' | 'refresh';

/** Decoded payload of a signed token. Times are epoch seconds. */
export interface TokenClaims {
  sub: string;
  app: string;
  jti: string;
  iat: number;
  exp: number;
  type: TokenType;
  /** Role names held at mint time; access tokens only. */
  roles?: string[];
  /** jti of the refresh token minted alongside this access token. */
  rid?: string;
}

export interface MintedToken {
  token: string;
  claims: TokenClaims;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  expiresIn: number;
}
