import { type FastifyInstance } from 'fastify';
import { DIRECTORY_PERMISSIONS, type DirectoryService } from '@tollgate/domain';
import {
  ApplicationParamsSchema,
  CreateUserRequestSchema,
  UpdateUserRequestSchema,
  UserParamsSchema,
} from '@tollgate/proto';
import { type AuthGuards } from '../plugins/auth';
import { serializeUser } from './serializers';
import { parseOrThrow } from './validation';

interface UserRouteDeps<TTx> {
  directoryService: DirectoryService<TTx>;
  guards: AuthGuards;
}

export function registerUserRoutes<TTx>(app: FastifyInstance, deps: UserRouteDeps<TTx>): void {
  const { directoryService, guards } = deps;
  const canRead = [guards.requirePermission(DIRECTORY_PERMISSIONS.USERS_READ)];
  const canWrite = [guards.requirePermission(DIRECTORY_PERMISSIONS.USERS_WRITE)];

  app.post('/applications/:applicationId/users', { preHandler: canWrite }, async (request, reply) => {
    const { applicationId } = parseOrThrow(ApplicationParamsSchema, request.params, 'Invalid application id');
    const body = parseOrThrow(CreateUserRequestSchema, request.body, 'Invalid user data');
    const user = await directoryService.createUser(applicationId, body);
    return reply.status(201).send(serializeUser(user));
  });

  app.get('/applications/:applicationId/users', { preHandler: canRead }, async (request, reply) => {
    const { applicationId } = parseOrThrow(ApplicationParamsSchema, request.params, 'Invalid application id');
    const users = await directoryService.listUsers(applicationId);
    return reply.status(200).send(users.map(serializeUser));
  });

  app.get('/applications/:applicationId/users/:userId', { preHandler: canRead }, async (request, reply) => {
    const { applicationId, userId } = parseOrThrow(UserParamsSchema, request.params, 'Invalid user path');
    const user = await directoryService.getUser(applicationId, userId);
    return reply.status(200).send(serializeUser(user));
  });

  app.patch('/applications/:applicationId/users/:userId', { preHandler: canWrite }, async (request, reply) => {
    const { applicationId, userId } = parseOrThrow(UserParamsSchema, request.params, 'Invalid user path');
    const body = parseOrThrow(UpdateUserRequestSchema, request.body, 'Invalid user data');
    const user = await directoryService.updateUser(applicationId, userId, body);
    return reply.status(200).send(serializeUser(user));
  });
}
