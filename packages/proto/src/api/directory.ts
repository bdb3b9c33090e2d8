import { z } from 'zod';
import { isValidPermission } from '@tollgate/domain';
import { ApplicationIdSchema, LoginSchema, PasswordSchema } from './auth';

const NameSchema = z.string().trim().min(1, 'Name is required').max(64, 'Name must be at most 64 characters');
const DescriptionSchema = z.string().trim().max(500).nullable();

export const PermissionSchema = z
  .string()
  .refine(isValidPermission, 'Permission must look like resource:action');

export const ApplicationParamsSchema = z.object({
  applicationId: ApplicationIdSchema,
});

export const UserParamsSchema = ApplicationParamsSchema.extend({
  userId: z.string().uuid(),
});

export const RoleParamsSchema = ApplicationParamsSchema.extend({
  roleId: z.string().uuid(),
});

export const GrantParamsSchema = UserParamsSchema.extend({
  roleId: z.string().uuid(),
});

export const CreateApplicationRequestSchema = z.object({
  name: NameSchema,
  description: DescriptionSchema.optional(),
});

export const UpdateApplicationRequestSchema = z
  .object({
    name: NameSchema.optional(),
    description: DescriptionSchema.optional(),
    enabled: z.boolean().optional(),
  })
  .refine((body) => Object.keys(body).length > 0, 'At least one field is required');

export const CreateUserRequestSchema = z.object({
  login: LoginSchema,
  password: PasswordSchema,
});

export const UpdateUserRequestSchema = z
  .object({
    enabled: z.boolean().optional(),
    password: PasswordSchema.optional(),
  })
  .refine((body) => body.enabled !== undefined || body.password !== undefined, 'At least one field is required');

export const CreateRoleRequestSchema = z.object({
  name: NameSchema,
  description: DescriptionSchema.optional(),
  permissions: z.array(PermissionSchema).max(256).default([]),
});

export const UpdateRoleRequestSchema = z
  .object({
    name: NameSchema.optional(),
    description: DescriptionSchema.optional(),
    permissions: z.array(PermissionSchema).max(256).optional(),
  })
  .refine((body) => Object.keys(body).length > 0, 'At least one field is required');

export const GrantRoleRequestSchema = z.object({
  roleId: z.string().uuid(),
});

export const ReplaceRolesRequestSchema = z.object({
  roleIds: z.array(z.string().uuid()).max(256),
});

export type CreateApplicationRequest = z.infer<typeof CreateApplicationRequestSchema>;
export type UpdateApplicationRequest = z.infer<typeof UpdateApplicationRequestSchema>;
export type CreateUserRequest = z.infer<typeof CreateUserRequestSchema>;
export type UpdateUserRequest = z.infer<typeof UpdateUserRequestSchema>;
export type CreateRoleRequest = z.infer<typeof CreateRoleRequestSchema>;
export type UpdateRoleRequest = z.infer<typeof UpdateRoleRequestSchema>;
export type GrantRoleRequest = z.infer<typeof GrantRoleRequestSchema>;
export type ReplaceRolesRequest = z.infer<typeof ReplaceRolesRequestSchema>;
