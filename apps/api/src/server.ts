import Fastify from 'fastify';
import { type SessionAdmissionController, type SessionService, type TokenService } from '@gatehouse/domain';
import { createLogger, type RequestGate } from '@gatehouse/shared';
import { registerErrorHandler } from './plugins/error-handler';
import { createRateLimiter } from './plugins/rate-limit';
import { createSessionGuard } from './plugins/session';
import { registerHealthRoutes } from './routes/health';
import { registerSessionRoutes } from './routes/sessions';

const logger = createLogger({ name: 'api' });

export interface ServerDeps {
  gate: RequestGate;
  tokenService: TokenService;
  sessions: SessionAdmissionController;
  sessionService: SessionService;
  trustProxy: boolean;
}

export async function buildServer(deps: ServerDeps) {
  const app = Fastify({
    logger: false,
    bodyLimit: 1_048_576,
    trustProxy: deps.trustProxy,
  });

  registerErrorHandler(app);

  app.addHook('onRequest', (request, _reply, done) => {
    logger.info({ method: request.method, url: request.url, requestId: request.id }, 'Incoming request');
    done();
  });

  app.addHook(
    'onRequest',
    createRateLimiter({ gate: deps.gate, tokenService: deps.tokenService, trustProxy: deps.trustProxy }),
  );

  app.addHook('onResponse', (request, reply, done) => {
    logger.info(
      { method: request.method, url: request.url, statusCode: reply.statusCode, requestId: request.id },
      'Request completed',
    );
    done();
  });

  const requireSession = createSessionGuard(deps.sessions);

  registerHealthRoutes(app);
  registerSessionRoutes(app, { sessionService: deps.sessionService, requireSession });

  return app;
}
