import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@gatehouse/shared';

const logger = createLogger({ name: 'api:error' });

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof AppError) {
      logger.warn({ code: error.code, ...error.safeMeta }, error.message);
      const retryAfter = error.safeMeta.retryAfter;
      if (error.code === ErrorCode.RATE_LIMITED && typeof retryAfter === 'number') {
        void reply.header('Retry-After', String(retryAfter));
      }
      return reply.status(error.httpStatus).send(error.toJSON());
    }

    // Fastify's own errors (bad JSON body, unsupported media type) carry a 4xx status.
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ code: ErrorCode.BAD_REQUEST, message: error.message });
    }

    logger.error({ err: error.message }, 'Unhandled error');

    return reply.status(500).send({
      code: ErrorCode.INTERNAL,
      message: 'Internal server error',
    });
  });

  app.setNotFoundHandler((_request, reply) => {
    return reply.status(404).send({ code: ErrorCode.NOT_FOUND, message: 'Route not found' });
  });
}
