import { type FastifyInstance } from 'fastify';
import { DIRECTORY_PERMISSIONS, type DirectoryService } from '@tollgate/domain';
import {
  ApplicationParamsSchema,
  CreateRoleRequestSchema,
  RoleParamsSchema,
  UpdateRoleRequestSchema,
} from '@tollgate/proto';
import { type AuthGuards } from '../plugins/auth';
import { serializeRole } from './serializers';
import { parseOrThrow } from './validation';

interface RoleRouteDeps<TTx> {
  directoryService: DirectoryService<TTx>;
  guards: AuthGuards;
}

export function registerRoleRoutes<TTx>(app: FastifyInstance, deps: RoleRouteDeps<TTx>): void {
  const { directoryService, guards } = deps;
  const canRead = [guards.requirePermission(DIRECTORY_PERMISSIONS.ROLES_READ)];
  const canWrite = [guards.requirePermission(DIRECTORY_PERMISSIONS.ROLES_WRITE)];

  app.post('/applications/:applicationId/roles', { preHandler: canWrite }, async (request, reply) => {
    const { applicationId } = parseOrThrow(ApplicationParamsSchema, request.params, 'Invalid application id');
    const body = parseOrThrow(CreateRoleRequestSchema, request.body, 'Invalid role data');
    const role = await directoryService.createRole(applicationId, body);
    return reply.status(201).send(serializeRole(role));
  });

  app.get('/applications/:applicationId/roles', { preHandler: canRead }, async (request, reply) => {
    const { applicationId } = parseOrThrow(ApplicationParamsSchema, request.params, 'Invalid application id');
    const roles = await directoryService.listRoles(applicationId);
    return reply.status(200).send(roles.map(serializeRole));
  });

  app.get('/applications/:applicationId/roles/:roleId', { preHandler: canRead }, async (request, reply) => {
    const { applicationId, roleId } = parseOrThrow(RoleParamsSchema, request.params, 'Invalid role path');
    const role = await directoryService.getRole(applicationId, roleId);
    return reply.status(200).send(serializeRole(role));
  });

  app.patch('/applications/:applicationId/roles/:roleId', { preHandler: canWrite }, async (request, reply) => {
    const { applicationId, roleId } = parseOrThrow(RoleParamsSchema, request.params, 'Invalid role path');
    const body = parseOrThrow(UpdateRoleRequestSchema, request.body, 'Invalid role data');
    const role = await directoryService.updateRole(applicationId, roleId, body);
    return reply.status(200).send(serializeRole(role));
  });

  app.delete('/applications/:applicationId/roles/:roleId', { preHandler: canWrite }, async (request, reply) => {
    const { applicationId, roleId } = parseOrThrow(RoleParamsSchema, request.params, 'Invalid role path');
    await directoryService.deleteRole(applicationId, roleId);
    return reply.status(204).send();
  });
}
