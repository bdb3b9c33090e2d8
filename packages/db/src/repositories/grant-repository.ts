import { type PoolClient } from 'pg';
import { type GrantRepository, type Role } from '@tollgate/domain';
import { type TableNames } from '../tables';
import { mapRoleRow, type RoleRow } from './rows';

export class PgGrantRepository implements GrantRepository<PoolClient> {
  constructor(private readonly tables: TableNames) {}

  async create(
    client: PoolClient,
    grant: { applicationId: string; userId: string; roleId: string },
  ): Promise<boolean> {
    const result = await client.query(
      `INSERT INTO ${this.tables.grants} (application_id, user_id, role_id)
       VALUES ($1, $2, $3)
       ON CONFLICT DO NOTHING`,
      [grant.applicationId, grant.userId, grant.roleId],
    );
    return result.rowCount === 1;
  }

  async delete(
    client: PoolClient,
    applicationId: string,
    userId: string,
    roleId: string,
  ): Promise<boolean> {
    const result = await client.query(
      `DELETE FROM ${this.tables.grants}
       WHERE application_id = $1 AND user_id = $2 AND role_id = $3`,
      [applicationId, userId, roleId],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async deleteByRole(client: PoolClient, applicationId: string, roleId: string): Promise<number> {
    const result = await client.query(
      `DELETE FROM ${this.tables.grants} WHERE application_id = $1 AND role_id = $2`,
      [applicationId, roleId],
    );
    return result.rowCount ?? 0;
  }

  async deleteByUser(client: PoolClient, applicationId: string, userId: string): Promise<number> {
    const result = await client.query(
      `DELETE FROM ${this.tables.grants} WHERE application_id = $1 AND user_id = $2`,
      [applicationId, userId],
    );
    return result.rowCount ?? 0;
  }

  async listRolesForUser(client: PoolClient, applicationId: string, userId: string): Promise<Role[]> {
    const result = await client.query<RoleRow>(
      `SELECT r.id, r.application_id, r.name, r.description, r.permissions, r.created_at, r.updated_at
       FROM ${this.tables.grants} g
       JOIN ${this.tables.roles} r ON r.application_id = g.application_id AND r.id = g.role_id
       WHERE g.application_id = $1 AND g.user_id = $2
       ORDER BY r.name`,
      [applicationId, userId],
    );
    return result.rows.map(mapRoleRow);
  }
}
