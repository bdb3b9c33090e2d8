import { type FastifyRequest } from 'fastify';
import { AppError, ErrorCode } from '@tollgate/shared';
import { type AuthzService, type TokenClaims } from '@tollgate/domain';
import { ApplicationParamsSchema } from '@tollgate/proto';

declare module 'fastify' {
  interface FastifyRequest {
    claims?: TokenClaims;
  }
}

export type PreHandler = (request: FastifyRequest) => Promise<void>;

export interface AuthGuards {
  /** Global operations outside any single application. */
  requireSuperUser: PreHandler;
  /** Checks `permission` in the application named by the :applicationId path segment. */
  requirePermission(permission: string): PreHandler;
}

export function extractBearerToken(request: FastifyRequest): string {
  const header = request.headers.authorization;
  if (!header || !header.startsWith('Bearer ') || header.length === 7) {
    throw new AppError(ErrorCode.UNAUTHORIZED, 'Missing or invalid authorization header');
  }
  return header.slice(7);
}

export function createAuthGuards<TTx>(authzService: AuthzService<TTx>): AuthGuards {
  return {
    async requireSuperUser(request) {
      request.claims = await authzService.requireSuperUser(extractBearerToken(request));
    },

    requirePermission(permission: string): PreHandler {
      return async (request) => {
        const token = extractBearerToken(request);
        const params = ApplicationParamsSchema.safeParse(request.params);
        if (!params.success) {
          throw new AppError(ErrorCode.VALIDATION, 'Invalid application id');
        }
        request.claims = await authzService.authorize(token, permission, params.data.applicationId);
      };
    },
  };
}
