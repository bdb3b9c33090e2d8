import { z } from 'zod';

const LOGIN_REGEX = /^[A-Za-z0-9._@-]+$/;

/** Login names as stored; matching is exact, so no case folding. */
export const LoginSchema = z
  .string()
  .trim()
  .min(3, 'Login must be at least 3 characters')
  .max(64, 'Login must be at most 64 characters')
  .regex(LOGIN_REGEX, 'Login may only contain letters, digits, dots, underscores, @ and hyphens');

export const PasswordSchema = z
  .string()
  .min(8, 'Password must be at least 8 characters')
  .max(128, 'Password must be at most 128 characters');

export const ApplicationIdSchema = z.string().uuid('Application id must be a UUID');

// Credentials are only length-checked here so every wrong pair fails the same way.
export const LoginRequestSchema = z.object({
  applicationId: ApplicationIdSchema,
  login: z.string().min(1).max(64),
  password: z.string().min(1).max(128),
});

export const TokenPairResponseSchema = z.object({
  accessToken: z.string(),
  refreshToken: z.string(),
  tokenType: z.literal('Bearer'),
  expiresIn: z.number().int().positive(),
});

export const RefreshRequestSchema = z.object({
  refreshToken: z.string().min(1),
});

export const AuthorizeRequestSchema = z.object({
  permission: z.string().min(1).max(256),
  applicationId: ApplicationIdSchema.optional(),
});

export const AuthorizeResponseSchema = z.object({
  allowed: z.literal(true),
  userId: z.string(),
  applicationId: z.string(),
});

export const MeResponseSchema = z.object({
  userId: z.string(),
  applicationId: z.string(),
  superUser: z.boolean(),
  roles: z.array(z.string()),
  permissions: z.union([z.literal('*'), z.array(z.string())]),
  expiresAt: z.string().datetime(),
});

export type LoginRequest = z.infer<typeof LoginRequestSchema>;
export type TokenPairResponse = z.infer<typeof TokenPairResponseSchema>;
export type RefreshRequest = z.infer<typeof RefreshRequestSchema>;
export type AuthorizeRequest = z.infer<typeof AuthorizeRequestSchema>;
export type AuthorizeResponse = z.infer<typeof AuthorizeResponseSchema>;
export type MeResponse = z.infer<typeof MeResponseSchema>;
