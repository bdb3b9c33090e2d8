import { type FastifyInstance } from 'fastify';
import { DIRECTORY_PERMISSIONS, type DirectoryService } from '@tollgate/domain';
import {
  GrantParamsSchema,
  GrantRoleRequestSchema,
  ReplaceRolesRequestSchema,
  UserParamsSchema,
} from '@tollgate/proto';
import { type AuthGuards } from '../plugins/auth';
import { serializeRole } from './serializers';
import { parseOrThrow } from './validation';

interface GrantRouteDeps<TTx> {
  directoryService: DirectoryService<TTx>;
  guards: AuthGuards;
}

/** Role assignments of one user. Every response carries the user's full role list. */
export function registerGrantRoutes<TTx>(app: FastifyInstance, deps: GrantRouteDeps<TTx>): void {
  const { directoryService, guards } = deps;
  const canRead = [guards.requirePermission(DIRECTORY_PERMISSIONS.GRANTS_READ)];
  const canWrite = [guards.requirePermission(DIRECTORY_PERMISSIONS.GRANTS_WRITE)];
  const path = '/applications/:applicationId/users/:userId/roles';

  app.get(path, { preHandler: canRead }, async (request, reply) => {
    const { applicationId, userId } = parseOrThrow(UserParamsSchema, request.params, 'Invalid user path');
    const roles = await directoryService.listUserRoles(applicationId, userId);
    return reply.status(200).send(roles.map(serializeRole));
  });

  app.post(path, { preHandler: canWrite }, async (request, reply) => {
    const { applicationId, userId } = parseOrThrow(UserParamsSchema, request.params, 'Invalid user path');
    const body = parseOrThrow(GrantRoleRequestSchema, request.body, 'Invalid grant data');
    const roles = await directoryService.grantRole(applicationId, userId, body.roleId);
    return reply.status(201).send(roles.map(serializeRole));
  });

  app.put(path, { preHandler: canWrite }, async (request, reply) => {
    const { applicationId, userId } = parseOrThrow(UserParamsSchema, request.params, 'Invalid user path');
    const body = parseOrThrow(ReplaceRolesRequestSchema, request.body, 'Invalid grant data');
    const roles = await directoryService.replaceUserRoles(applicationId, userId, body.roleIds);
    return reply.status(200).send(roles.map(serializeRole));
  });

  app.delete(`${path}/:roleId`, { preHandler: canWrite }, async (request, reply) => {
    const { applicationId, userId, roleId } = parseOrThrow(GrantParamsSchema, request.params, 'Invalid grant path');
    const roles = await directoryService.revokeRole(applicationId, userId, roleId);
    return reply.status(200).send(roles.map(serializeRole));
  });
}
