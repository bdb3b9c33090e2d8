import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@tollgate/shared';
import { isAuthzError } from '@tollgate/domain';

const logger = createLogger({ name: 'api:error' });

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, request, reply) => {
    if (isAuthzError(error)) {
      logger.warn({ kind: error.kind, requestId: request.id, ...error.safeMeta }, error.message);
      const appError = AppError.fromAuthzError(error);
      return reply.status(appError.httpStatus).send(appError.toJSON());
    }

    if (error instanceof AppError) {
      logger.warn({ code: error.code, requestId: request.id, ...error.safeMeta }, error.message);
      return reply.status(error.httpStatus).send(error.toJSON());
    }

    // Fastify's own client errors: malformed JSON, unsupported media type, oversized body.
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        code: ErrorCode.BAD_REQUEST,
        message: error.message,
      });
    }

    logger.error({ err: error.message, requestId: request.id }, 'Unhandled error');

    return reply.status(500).send({
      code: ErrorCode.INTERNAL,
      message: 'Internal server error',
    });
  });
}
