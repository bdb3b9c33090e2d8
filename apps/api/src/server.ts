import Fastify, { type FastifyInstance } from 'fastify';
import { createLogger } from '@tollgate/shared';
import { type AuthzService, type DirectoryService } from '@tollgate/domain';
import { registerErrorHandler } from './plugins/error-handler';
import { createAuthGuards } from './plugins/auth';
import { createRateLimiter } from './plugins/rate-limit';
import { registerAuthRoutes } from './routes/auth';
import { registerApplicationRoutes } from './routes/applications';
import { registerUserRoutes } from './routes/users';
import { registerRoleRoutes } from './routes/roles';
import { registerGrantRoutes } from './routes/grants';
import { registerStatsRoutes } from './routes/stats';
import { registerVersionRoutes } from './routes/version';

const logger = createLogger({ name: 'api' });

export interface ServerDeps<TTx> {
  authzService: AuthzService<TTx>;
  directoryService: DirectoryService<TTx>;
  loginRateLimit: { windowMs: number; maxRequests: number };
}

export function buildServer<TTx>(deps: ServerDeps<TTx>): FastifyInstance {
  const app = Fastify({
    logger: false,
    bodyLimit: 65_536,
  });

  registerErrorHandler(app);

  const { authzService, directoryService } = deps;
  const guards = createAuthGuards(authzService);
  const loginRateLimit = createRateLimiter(deps.loginRateLimit);

  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  registerAuthRoutes(app, { authzService, loginRateLimit });
  registerApplicationRoutes(app, { directoryService, guards });
  registerUserRoutes(app, { directoryService, guards });
  registerRoleRoutes(app, { directoryService, guards });
  registerGrantRoutes(app, { directoryService, guards });
  registerStatsRoutes(app, { directoryService, guards });
  registerVersionRoutes(app, { guards });

  app.addHook('onRequest', (request, _reply, done) => {
    logger.info({ method: request.method, url: request.url, requestId: request.id }, 'Incoming request');
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    logger.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        requestId: request.id,
        userId: request.claims?.sub,
      },
      'Request completed',
    );
    done();
  });

  app.addHook('onClose', (_instance, done) => {
    loginRateLimit.stop();
    done();
  });

  return app;
}
