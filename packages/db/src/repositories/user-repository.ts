import { type PoolClient } from 'pg';
import { type User, type UserRepository } from '@tollgate/domain';
import { type TableNames } from '../tables';
import { USER_COLUMNS, mapUserRow, type UserRow } from './rows';

export class PgUserRepository implements UserRepository<PoolClient> {
  constructor(private readonly tables: TableNames) {}

  async create(
    client: PoolClient,
    user: { id: string; applicationId: string; login: string; passwordHash: string },
  ): Promise<User> {
    const result = await client.query<UserRow>(
      `INSERT INTO ${this.tables.users} (id, application_id, login, password_hash)
       VALUES ($1, $2, $3, $4)
       RETURNING ${USER_COLUMNS}`,
      [user.id, user.applicationId, user.login, user.passwordHash],
    );
    return mapUserRow(result.rows[0]);
  }

  async findById(client: PoolClient, applicationId: string, id: string): Promise<User | null> {
    const result = await client.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM ${this.tables.users}
       WHERE application_id = $1 AND id = $2`,
      [applicationId, id],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async findByLogin(client: PoolClient, applicationId: string, login: string): Promise<User | null> {
    const result = await client.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM ${this.tables.users}
       WHERE application_id = $1 AND login = $2`,
      [applicationId, login],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async listByApplication(client: PoolClient, applicationId: string): Promise<User[]> {
    const result = await client.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM ${this.tables.users}
       WHERE application_id = $1
       ORDER BY login`,
      [applicationId],
    );
    return result.rows.map(mapUserRow);
  }

  async setEnabled(
    client: PoolClient,
    applicationId: string,
    id: string,
    enabled: boolean,
  ): Promise<User | null> {
    const result = await client.query<UserRow>(
      `UPDATE ${this.tables.users}
       SET enabled = $3, updated_at = NOW()
       WHERE application_id = $1 AND id = $2
       RETURNING ${USER_COLUMNS}`,
      [applicationId, id, enabled],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async updatePasswordHash(
    client: PoolClient,
    applicationId: string,
    id: string,
    passwordHash: string,
  ): Promise<boolean> {
    const result = await client.query(
      `UPDATE ${this.tables.users}
       SET password_hash = $3, updated_at = NOW()
       WHERE application_id = $1 AND id = $2`,
      [applicationId, id, passwordHash],
    );
    return (result.rowCount ?? 0) > 0;
  }
}
