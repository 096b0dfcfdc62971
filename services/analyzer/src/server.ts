import Fastify, { type FastifyError, type FastifyServerOptions } from 'fastify';
import { AnalyzerError, type ErrorResponse } from './errors';
import { registerStringRoutes } from './routes/strings';
import type { RecordStore } from './contracts/recordStore';

export interface BuildAppOptions {
  store: RecordStore;
  logger?: FastifyServerOptions['logger'];
}

function isFastifyClientError(err: unknown): err is FastifyError & { statusCode: number } {
  return (
    err instanceof Error &&
    'statusCode' in err &&
    typeof err.statusCode === 'number' &&
    err.statusCode >= 400 &&
    err.statusCode < 500
  );
}

export async function buildApp({ store, logger = false }: BuildAppOptions) {
  const app = Fastify({ logger });

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof AnalyzerError) {
      if (err.statusCode >= 500) req.log.error({ err, code: err.code }, err.message);
      const body: ErrorResponse = { error: err.code, message: err.message };
      if (err.details) body.details = err.details;
      return reply.code(err.statusCode).send(body);
    }
    if (isFastifyClientError(err)) {
      const body: ErrorResponse = { error: err.code ?? 'bad_request', message: err.message };
      return reply.code(err.statusCode).send(body);
    }
    req.log.error({ err }, 'Unhandled error');
    const body: ErrorResponse = { error: 'internal_error', message: 'An unexpected error occurred' };
    return reply.code(500).send(body);
  });

  app.get('/health', async () => {
    const storage = await store.health();
    return { status: storage === 'ok' ? 'ok' : 'degraded', storage };
  });

  app.addHook('onClose', async () => {
    await store.close();
  });

  await registerStringRoutes(app, store);
  return app;
}
