import { existsSync, readdirSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

/** One flat layer of configuration values, keyed like environment variables. */
export type ConfigSource = Record<string, string | undefined>;

export const DEFAULT_SECRETS_DIR = '/run/secrets';

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;
const SECRET_FILE_NAME = /^[A-Z][A-Z0-9_]*$/;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export const DatabaseConfigSchema = z.object({
  DATABASE_URL: z.string().min(1),
  DB_SCHEMA: z
    .string()
    .default('')
    .refine((v) => v === '' || IDENTIFIER.test(v), 'must be a lowercase SQL identifier'),
  TABLE_PREFIX: z.string().regex(IDENTIFIER, 'must be a lowercase SQL identifier').default('tg_'),
});

export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;

const SigningKeySchema = z.object({
  kid: z.string().min(1),
  secret: z.string().min(32, 'signing secrets need at least 32 characters'),
});

export type SigningKey = z.infer<typeof SigningKeySchema>;

const SigningKeysJsonSchema = z
  .string()
  .transform((raw, ctx) => {
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a JSON array' });
      return z.NEVER;
    }
  })
  .pipe(z.array(SigningKeySchema).min(1));

export const TokenConfigSchema = z.object({
  TOKEN_SECRET: z.string().min(32, 'signing secrets need at least 32 characters').optional(),
  TOKEN_KEYS: SigningKeysJsonSchema.optional(),
  TOKEN_ACTIVE_KID: z.string().min(1).optional(),
  TOKEN_ISSUER: z.string().min(1).default('tollgate'),
  TOKEN_TTL_ACCESS: z.coerce.number().int().positive().default(900),
  TOKEN_TTL_REFRESH: z.coerce.number().int().positive().default(2_592_000),
});

export type TokenConfig = z.infer<typeof TokenConfigSchema>;

export const SuperUserConfigSchema = z.object({
  SUPER_USER_LOGIN: z.string().min(1).optional(),
  SUPER_USER_PASSWORD: z.string().min(1).optional(),
});

export const PasswordHashConfigSchema = z.object({
  PASSWORD_HASH_MEMORY_COST: z.coerce.number().int().min(1024).default(19456),
  PASSWORD_HASH_TIME_COST: z.coerce.number().int().min(1).default(2),
  PASSWORD_HASH_PARALLELISM: z.coerce.number().int().min(1).default(1),
});

export type PasswordHashConfig = z.infer<typeof PasswordHashConfigSchema>;

export const ApiConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .merge(TokenConfigSchema)
  .merge(SuperUserConfigSchema)
  .merge(PasswordHashConfigSchema)
  .extend({
    PERMISSION_CACHE_ENABLED: booleanFlag,
    API_HOST: z.string().default('0.0.0.0'),
    API_PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    LOGIN_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
    LOGIN_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(10),
  })
  .superRefine((config, ctx) => {
    if ((config.SUPER_USER_LOGIN === undefined) !== (config.SUPER_USER_PASSWORD === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPER_USER_PASSWORD'],
        message: 'SUPER_USER_LOGIN and SUPER_USER_PASSWORD must be set together',
      });
    }
  });

export type ApiConfig = z.infer<typeof ApiConfigSchema>;

export const WorkerConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema).extend({
  PRUNE_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  WORKER_HEALTHCHECK_PATH: z.string().min(1).default('/tmp/.tollgate-worker-healthy'),
});

export type WorkerConfig = z.infer<typeof WorkerConfigSchema>;

export function loadConfig<T extends z.ZodType>(
  schema: T,
  env: ConfigSource = process.env,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }
  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Reads a JSON object of settings. Non-string values are stored as their JSON text. */
export function readConfigFile(path: string): ConfigSource {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (!isRecord(parsed)) {
    throw new Error(`Config file ${path} must contain a JSON object`);
  }
  const source: ConfigSource = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (value === null || value === undefined) continue;
    source[key] = typeof value === 'string' ? value : JSON.stringify(value);
  }
  return source;
}

/** One file per key, named like the variable; contents are trimmed. A missing dir is empty. */
export function readSecretsDir(dir: string): ConfigSource {
  if (!existsSync(dir)) return {};
  const source: ConfigSource = {};
  for (const name of readdirSync(dir)) {
    if (!SECRET_FILE_NAME.test(name)) continue;
    const path = join(dir, name);
    if (!statSync(path).isFile()) continue;
    source[name] = readFileSync(path, 'utf-8').trim();
  }
  return source;
}

/** Later sources win key by key; undefined values never override. */
export function mergeConfigSources(...sources: ConfigSource[]): ConfigSource {
  const merged: ConfigSource = {};
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) merged[key] = value;
    }
  }
  return merged;
}

/**
 * Resolves configuration from schema defaults, then the JSON file named by
 * TOLLGATE_CONFIG_FILE, then the secrets directory, then the environment.
 */
export function loadLayeredConfig<T extends z.ZodType>(
  schema: T,
  env: ConfigSource = process.env,
): Readonly<z.infer<T>> {
  const layers: ConfigSource[] = [];
  const configFile = env.TOLLGATE_CONFIG_FILE;
  if (configFile) layers.push(readConfigFile(configFile));
  layers.push(readSecretsDir(env.TOLLGATE_SECRETS_DIR ?? DEFAULT_SECRETS_DIR));
  layers.push(env);

  return Object.freeze(loadConfig(schema, mergeConfigSources(...layers)));
}

export interface SigningKeyRing {
  activeKid: string;
  keys: SigningKey[];
}

export const SINGLE_SECRET_KID = 'default';

/**
 * Builds the key ring from TOKEN_KEYS, or from TOKEN_SECRET alone. The active
 * kid defaults to the first listed key.
 */
export function resolveSigningKeys(
  config: Pick<TokenConfig, 'TOKEN_SECRET' | 'TOKEN_KEYS' | 'TOKEN_ACTIVE_KID'>,
): SigningKeyRing {
  let keys: SigningKey[];
  if (config.TOKEN_KEYS && config.TOKEN_KEYS.length > 0) {
    keys = config.TOKEN_KEYS;
  } else if (config.TOKEN_SECRET) {
    keys = [{ kid: SINGLE_SECRET_KID, secret: config.TOKEN_SECRET }];
  } else {
    throw new Error('No signing keys configured: set TOKEN_KEYS or TOKEN_SECRET');
  }

  const kids = new Set<string>();
  for (const key of keys) {
    if (kids.has(key.kid)) throw new Error(`Duplicate signing key id '${key.kid}'`);
    kids.add(key.kid);
  }

  const activeKid = config.TOKEN_ACTIVE_KID ?? keys[0].kid;
  if (!kids.has(activeKid)) {
    throw new Error(`Active signing key '${activeKid}' not found in keys`);
  }
  return { activeKid, keys };
}
