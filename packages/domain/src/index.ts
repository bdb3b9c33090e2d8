export type {
  Application,
  User,
  Role,
  Grant,
  RevokedToken,
  DirectoryStats,
} from './user';
export type { TokenType, TokenClaims, MintedToken, TokenPair } from './token';
export { AuthzError, isAuthzError, type AuthzErrorKind } from './errors';
export {
  SUPER_USER_ID,
  isSuperUser,
  isTokenExpired,
  toEpochSeconds,
  isValidPermission,
  normalizePermissions,
  canLogin,
} from './auth';
export {
  ALL_PERMISSIONS,
  DIRECTORY_PERMISSIONS,
  collectPermissions,
  hasPermission,
  listPermissions,
  type PermissionSet,
} from './permissions';
export type {
  TransactionRunner,
  ApplicationRepository,
  UserRepository,
  RoleRepository,
  GrantRepository,
  RevokedTokenRepository,
  StatsRepository,
  PasswordHasher,
  TokenSigner,
  Logger,
} from './ports';
export { TokenEngine, type TokenEngineDeps } from './token-engine';
export {
  PermissionResolver,
  PermissionCache,
  type PermissionResolverDeps,
} from './permission-resolver';
export {
  AuthzService,
  type AuthzServiceDeps,
  type SuperUserCredentials,
} from './authz-service';
export {
  DirectoryService,
  toPublicUser,
  type DirectoryServiceDeps,
  type PublicUser,
} from './directory-service';
