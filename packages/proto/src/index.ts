export {
  LoginSchema,
  PasswordSchema,
  ApplicationIdSchema,
  LoginRequestSchema,
  TokenPairResponseSchema,
  RefreshRequestSchema,
  AuthorizeRequestSchema,
  AuthorizeResponseSchema,
  MeResponseSchema,
  type LoginRequest,
  type TokenPairResponse,
  type RefreshRequest,
  type AuthorizeRequest,
  type AuthorizeResponse,
  type MeResponse,
} from './api/auth';
export {
  PermissionSchema,
  ApplicationParamsSchema,
  UserParamsSchema,
  RoleParamsSchema,
  GrantParamsSchema,
  CreateApplicationRequestSchema,
  UpdateApplicationRequestSchema,
  CreateUserRequestSchema,
  UpdateUserRequestSchema,
  CreateRoleRequestSchema,
  UpdateRoleRequestSchema,
  GrantRoleRequestSchema,
  ReplaceRolesRequestSchema,
  type CreateApplicationRequest,
  type UpdateApplicationRequest,
  type CreateUserRequest,
  type UpdateUserRequest,
  type CreateRoleRequest,
  type UpdateRoleRequest,
  type GrantRoleRequest,
  type ReplaceRolesRequest,
} from './api/directory';
