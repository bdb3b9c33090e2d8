const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

export interface TableNames {
  applications: string;
  users: string;
  roles: string;
  grants: string;
  revokedTokens: string;
  migrations: string;
}

/** Quoted, schema-qualified table names plus the raw prefix used for index names. */
export interface TableLayout {
  prefix: string;
  schema: string;
  tables: TableNames;
}

function assertIdentifier(value: string, label: string): void {
  if (!IDENTIFIER.test(value)) {
    throw new Error(`${label} '${value}' is not a valid SQL identifier`);
  }
}

export function resolveTableLayout(opts: { prefix: string; schema?: string }): TableLayout {
  const schema = opts.schema ?? '';
  if (opts.prefix !== '') assertIdentifier(opts.prefix, 'Table prefix');
  if (schema !== '') assertIdentifier(schema, 'Schema');

  const qualify = (name: string): string => {
    const table = `"${opts.prefix}${name}"`;
    return schema === '' ? table : `"${schema}".${table}`;
  };

  return {
    prefix: opts.prefix,
    schema,
    tables: {
      applications: qualify('applications'),
      users: qualify('users'),
      roles: qualify('roles'),
      grants: qualify('grants'),
      revokedTokens: qualify('revoked_tokens'),
      migrations: qualify('migrations'),
    },
  };
}

const PLACEHOLDER = /\{\{([a-z_]+)\}\}/g;

/** Substitutes {{table}} and {{prefix}} placeholders; unknown placeholders are an error. */
export function renderMigration(sql: string, layout: TableLayout): string {
  const values: Record<string, string> = {
    prefix: layout.prefix,
    applications: layout.tables.applications,
    users: layout.tables.users,
    roles: layout.tables.roles,
    grants: layout.tables.grants,
    revoked_tokens: layout.tables.revokedTokens,
  };
  return sql.replace(PLACEHOLDER, (match: string, name: string) => {
    const value = values[name];
    if (value === undefined) throw new Error(`Unknown migration placeholder ${match}`);
    return value;
  });
}
