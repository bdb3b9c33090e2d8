import { type Application, type PublicUser, type Role } from '@tollgate/domain';

export function serializeApplication(application: Application) {
  return {
    id: application.id,
    name: application.name,
    description: application.description,
    enabled: application.enabled,
    createdAt: application.createdAt.toISOString(),
    updatedAt: application.updatedAt.toISOString(),
  };
}

export function serializeUser(user: PublicUser) {
  return {
    id: user.id,
    applicationId: user.applicationId,
    login: user.login,
    enabled: user.enabled,
    createdAt: user.createdAt.toISOString(),
    updatedAt: user.updatedAt.toISOString(),
  };
}

export function serializeRole(role: Role) {
  return {
    id: role.id,
    applicationId: role.applicationId,
    name: role.name,
    description: role.description,
    permissions: role.permissions,
    createdAt: role.createdAt.toISOString(),
    updatedAt: role.updatedAt.toISOString(),
  };
}
