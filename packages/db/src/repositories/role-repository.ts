import { type PoolClient } from 'pg';
import { type Role, type RoleRepository } from '@tollgate/domain';
import { type TableNames } from '../tables';
import { ROLE_COLUMNS, mapRoleRow, type RoleRow } from './rows';

export class PgRoleRepository implements RoleRepository<PoolClient> {
  constructor(private readonly tables: TableNames) {}

  async create(
    client: PoolClient,
    role: {
      id: string;
      applicationId: string;
      name: string;
      description: string | null;
      permissions: string[];
    },
  ): Promise<Role> {
    const result = await client.query<RoleRow>(
      `INSERT INTO ${this.tables.roles} (id, application_id, name, description, permissions)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${ROLE_COLUMNS}`,
      [role.id, role.applicationId, role.name, role.description, role.permissions],
    );
    return mapRoleRow(result.rows[0]);
  }

  async findById(client: PoolClient, applicationId: string, id: string): Promise<Role | null> {
    const result = await client.query<RoleRow>(
      `SELECT ${ROLE_COLUMNS} FROM ${this.tables.roles}
       WHERE application_id = $1 AND id = $2`,
      [applicationId, id],
    );
    return result.rows[0] ? mapRoleRow(result.rows[0]) : null;
  }

  async findByName(client: PoolClient, applicationId: string, name: string): Promise<Role | null> {
    const result = await client.query<RoleRow>(
      `SELECT ${ROLE_COLUMNS} FROM ${this.tables.roles}
       WHERE application_id = $1 AND name = $2`,
      [applicationId, name],
    );
    return result.rows[0] ? mapRoleRow(result.rows[0]) : null;
  }

  async findByIds(client: PoolClient, applicationId: string, ids: readonly string[]): Promise<Role[]> {
    if (ids.length === 0) return [];
    const result = await client.query<RoleRow>(
      `SELECT ${ROLE_COLUMNS} FROM ${this.tables.roles}
       WHERE application_id = $1 AND id = ANY($2::uuid[])`,
      [applicationId, [...ids]],
    );
    return result.rows.map(mapRoleRow);
  }

  async listByApplication(client: PoolClient, applicationId: string): Promise<Role[]> {
    const result = await client.query<RoleRow>(
      `SELECT ${ROLE_COLUMNS} FROM ${this.tables.roles}
       WHERE application_id = $1
       ORDER BY name`,
      [applicationId],
    );
    return result.rows.map(mapRoleRow);
  }

  async update(
    client: PoolClient,
    applicationId: string,
    id: string,
    changes: { name?: string; description?: string | null; permissions?: string[] },
  ): Promise<Role | null> {
    const result = await client.query<RoleRow>(
      `UPDATE ${this.tables.roles}
       SET name = COALESCE($3, name),
           description = CASE WHEN $4::boolean THEN $5 ELSE description END,
           permissions = COALESCE($6::text[], permissions),
           updated_at = NOW()
       WHERE application_id = $1 AND id = $2
       RETURNING ${ROLE_COLUMNS}`,
      [
        applicationId,
        id,
        changes.name ?? null,
        changes.description !== undefined,
        changes.description ?? null,
        changes.permissions ?? null,
      ],
    );
    return result.rows[0] ? mapRoleRow(result.rows[0]) : null;
  }

  async delete(client: PoolClient, applicationId: string, id: string): Promise<boolean> {
    const result = await client.query(
      `DELETE FROM ${this.tables.roles} WHERE application_id = $1 AND id = $2`,
      [applicationId, id],
    );
    return (result.rowCount ?? 0) > 0;
  }
}
