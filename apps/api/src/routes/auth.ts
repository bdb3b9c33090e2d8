import { type FastifyInstance } from 'fastify';
import { isSuperUser, listPermissions, type AuthzService, type TokenPair } from '@tollgate/domain';
import {
  AuthorizeRequestSchema,
  LoginRequestSchema,
  RefreshRequestSchema,
  type AuthorizeResponse,
  type MeResponse,
  type TokenPairResponse,
} from '@tollgate/proto';
import { extractBearerToken } from '../plugins/auth';
import { type RateLimiter } from '../plugins/rate-limit';
import { parseOrThrow } from './validation';

interface AuthRouteDeps<TTx> {
  authzService: AuthzService<TTx>;
  loginRateLimit: RateLimiter;
}

function toTokenPairResponse(pair: TokenPair): TokenPairResponse {
  return {
    accessToken: pair.accessToken,
    refreshToken: pair.refreshToken,
    tokenType: 'Bearer',
    expiresIn: pair.expiresIn,
  };
}

export function registerAuthRoutes<TTx>(app: FastifyInstance, deps: AuthRouteDeps<TTx>): void {
  const { authzService, loginRateLimit } = deps;

  app.post('/auth/login', { preHandler: [loginRateLimit.check] }, async (request, reply) => {
    const body = parseOrThrow(LoginRequestSchema, request.body, 'Invalid login data');
    const pair = await authzService.login(body);
    return reply.status(200).send(toTokenPairResponse(pair));
  });

  app.post('/auth/refresh', { preHandler: [loginRateLimit.check] }, async (request, reply) => {
    const body = parseOrThrow(RefreshRequestSchema, request.body, 'Invalid refresh request');
    const pair = await authzService.refresh(body.refreshToken);
    return reply.status(200).send(toTokenPairResponse(pair));
  });

  app.post('/auth/logout', async (request, reply) => {
    await authzService.logout(extractBearerToken(request));
    return reply.status(204).send();
  });

  app.post('/auth/authorize', async (request, reply) => {
    const body = parseOrThrow(AuthorizeRequestSchema, request.body, 'Invalid authorize request');
    const claims = await authzService.authorize(extractBearerToken(request), body.permission, body.applicationId);
    const response: AuthorizeResponse = {
      allowed: true,
      userId: claims.sub,
      applicationId: body.applicationId ?? claims.app,
    };
    return reply.status(200).send(response);
  });

  app.get('/auth/me', async (request, reply) => {
    const { claims, permissions } = await authzService.inspect(extractBearerToken(request));
    const response: MeResponse = {
      userId: claims.sub,
      applicationId: claims.app,
      superUser: isSuperUser(claims.sub),
      roles: claims.roles ?? [],
      permissions: listPermissions(permissions),
      expiresAt: new Date(claims.exp * 1000).toISOString(),
    };
    return reply.status(200).send(response);
  });
}
