import { type FastifyInstance } from 'fastify';
import { version } from '../../package.json';
import { type AuthGuards } from '../plugins/auth';

interface VersionRouteDeps {
  guards: AuthGuards;
}

export function registerVersionRoutes(app: FastifyInstance, deps: VersionRouteDeps): void {
  app.get('/version', { preHandler: [deps.guards.requireSuperUser] }, async (_request, reply) => {
    return reply.status(200).send({ api: version, fastify: app.version, node: process.version });
  });
}
