export interface Application {
  id: string;
  name: string;
  description: string | null;
  enabled: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface User {
  id: string;
  applicationId: string;
  login: string;
  passwordHash: string;
  enabled: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface Role {
  id: string;
  applicationId: string;
  name: string;
  description: string | null;
  permissions: string[];
  createdAt: Date;
  updatedAt: Date;
}

export interface Grant {
  applicationId: string;
  userId: string;
  roleId: string;
  createdAt: Date;
}

export interface RevokedToken {
  jti: string;
  expiresAt: Date;
  revokedAt: Date;
}

export interface DirectoryStats {
  applications: number;
  users: number;
  usersWithoutRoles: number;
  roles: number;
  rolesWithoutPermissions: number;
  grants: number;
  revokedTokens: number;
}
