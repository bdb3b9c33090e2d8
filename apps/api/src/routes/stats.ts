import { type FastifyInstance } from 'fastify';
import { type DirectoryService } from '@tollgate/domain';
import { type AuthGuards } from '../plugins/auth';

interface StatsRouteDeps<TTx> {
  directoryService: DirectoryService<TTx>;
  guards: AuthGuards;
}

export function registerStatsRoutes<TTx>(app: FastifyInstance, deps: StatsRouteDeps<TTx>): void {
  const { directoryService, guards } = deps;

  app.get('/stats', { preHandler: [guards.requireSuperUser] }, async (_request, reply) => {
    const stats = await directoryService.getStats();
    return reply.status(200).send(stats);
  });
}
