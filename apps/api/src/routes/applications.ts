import { type FastifyInstance } from 'fastify';
import { type DirectoryService } from '@tollgate/domain';
import {
  ApplicationParamsSchema,
  CreateApplicationRequestSchema,
  UpdateApplicationRequestSchema,
} from '@tollgate/proto';
import { type AuthGuards } from '../plugins/auth';
import { serializeApplication } from './serializers';
import { parseOrThrow } from './validation';

interface ApplicationRouteDeps<TTx> {
  directoryService: DirectoryService<TTx>;
  guards: AuthGuards;
}

// Applications sit above the tenant boundary, so only the super-user manages them.
export function registerApplicationRoutes<TTx>(app: FastifyInstance, deps: ApplicationRouteDeps<TTx>): void {
  const { directoryService, guards } = deps;
  const preHandler = [guards.requireSuperUser];

  app.post('/applications', { preHandler }, async (request, reply) => {
    const body = parseOrThrow(CreateApplicationRequestSchema, request.body, 'Invalid application data');
    const application = await directoryService.createApplication(body);
    return reply.status(201).send(serializeApplication(application));
  });

  app.get('/applications', { preHandler }, async (_request, reply) => {
    const applications = await directoryService.listApplications();
    return reply.status(200).send(applications.map(serializeApplication));
  });

  app.get('/applications/:applicationId', { preHandler }, async (request, reply) => {
    const { applicationId } = parseOrThrow(ApplicationParamsSchema, request.params, 'Invalid application id');
    const application = await directoryService.getApplication(applicationId);
    return reply.status(200).send(serializeApplication(application));
  });

  app.patch('/applications/:applicationId', { preHandler }, async (request, reply) => {
    const { applicationId } = parseOrThrow(ApplicationParamsSchema, request.params, 'Invalid application id');
    const body = parseOrThrow(UpdateApplicationRequestSchema, request.body, 'Invalid application data');
    const application = await directoryService.updateApplication(applicationId, body);
    return reply.status(200).send(serializeApplication(application));
  });

  app.delete('/applications/:applicationId', { preHandler }, async (request, reply) => {
    const { applicationId } = parseOrThrow(ApplicationParamsSchema, request.params, 'Invalid application id');
    await directoryService.deleteApplication(applicationId);
    return reply.status(204).send();
  });
}
