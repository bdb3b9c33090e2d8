import { type PoolClient } from 'pg';
import { type RevokedToken, type RevokedTokenRepository } from '@tollgate/domain';
import { type TableNames } from '../tables';

export class PgRevokedTokenRepository implements RevokedTokenRepository<PoolClient> {
  constructor(private readonly tables: TableNames) {}

  async insert(client: PoolClient, token: RevokedToken): Promise<boolean> {
    const result = await client.query(
      `INSERT INTO ${this.tables.revokedTokens} (jti, expires_at, revoked_at)
       VALUES ($1, $2, $3)
       ON CONFLICT (jti) DO NOTHING`,
      [token.jti, token.expiresAt, token.revokedAt],
    );
    return result.rowCount === 1;
  }

  async isRevoked(client: PoolClient, jti: string): Promise<boolean> {
    const result = await client.query(
      `SELECT 1 FROM ${this.tables.revokedTokens} WHERE jti = $1`,
      [jti],
    );
    return result.rows.length > 0;
  }

  async deleteExpired(client: PoolClient, now: Date): Promise<number> {
    const result = await client.query(
      `DELETE FROM ${this.tables.revokedTokens} WHERE expires_at <= $1`,
      [now],
    );
    return result.rowCount ?? 0;
  }
}
