export { createLogger, sanitize, setLogLevel, type SafeLogger } from './logger';
export { AppError, ErrorCode } from './errors';
export {
  loadConfig,
  loadLayeredConfig,
  mergeConfigSources,
  readConfigFile,
  readSecretsDir,
  resolveSigningKeys,
  DEFAULT_SECRETS_DIR,
  SINGLE_SECRET_KID,
  BaseConfigSchema,
  DatabaseConfigSchema,
  TokenConfigSchema,
  SuperUserConfigSchema,
  PasswordHashConfigSchema,
  ApiConfigSchema,
  WorkerConfigSchema,
  type ConfigSource,
  type BaseConfig,
  type DatabaseConfig,
  type TokenConfig,
  type PasswordHashConfig,
  type ApiConfig,
  type WorkerConfig,
  type SigningKey,
  type SigningKeyRing,
} from './config';
export { generateId } from './id';
export { startHealthBeat, touchHealthFile, DEFAULT_HEALTH_FILE } from './healthcheck';
export { Argon2PasswordHasher, type Argon2Options } from './auth/password-hasher';
export { JoseTokenService } from './auth/token-service';
