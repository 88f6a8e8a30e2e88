import cluster from 'node:cluster';
import Fastify, { type FastifyInstance } from 'fastify';
import { parseBind } from './config.js';

export type ResponseStatus = 'success' | 'error';

export type StandardResponse = {
  timestamp: string;
  status: ResponseStatus;
  message: string;
  data: Record<string, unknown> | null;
};

export function standardResponse(
  status: ResponseStatus,
  message: string,
  data: Record<string, unknown> | null = null,
  now: Date = new Date(),
): StandardResponse {
  return { timestamp: now.toISOString(), status, message, data };
}

export function buildApp(opts: { logger?: boolean; now?: () => Date } = {}): FastifyInstance {
  const now = opts.now ?? (() => new Date());
  const app = Fastify({ logger: opts.logger ?? true });

  app.get('/', async () => standardResponse('success', 'Welcome to PetCare API!', null, now()));

  // --- Health check ---
  app.get('/health', async () => standardResponse('success', 'All services are active.', null, now()));

  app.setNotFoundHandler((req, reply) => {
    reply.code(404).send(standardResponse('error', 'Not Found', null, now()));
  });

  app.setErrorHandler((err, req, reply) => {
    if (err.validation) {
      reply.code(422).send(standardResponse('error', 'Input validation failed', { errors: err.validation }, now()));
      return;
    }
    const statusCode = err.statusCode ?? 500;
    if (statusCode >= 500) req.log.error(err);
    const message = statusCode >= 500 ? 'Internal Server Error' : err.message;
    reply.code(statusCode).send(standardResponse('error', message, null, now()));
  });

  return app;
}

export async function serve(bind: string): Promise<FastifyInstance> {
  const { host, port } = parseBind(bind);
  const app = buildApp();

  for (const sig of ['SIGINT', 'SIGTERM'] as const) {
    process.once(sig, () => {
      app.log.info(`${sig} → closing`);
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error(err);
          process.exit(1);
        },
      );
    });
  }

  await app.listen({ port, host });
  app.log.info(`Up: http://${host}:${port}`);
  return app;
}

/** Primary forks `workers` processes sharing the listening socket; a dead worker is not respawned. */
function startCluster(workers: number) {
  let failed = false;
  for (let i = 0; i < workers; i++) cluster.fork();

  cluster.on('exit', (worker, code, signal) => {
    if (code !== 0 || signal) failed = true;
    console.error(`worker ${worker.process.pid} exited (${signal ?? code})`);
    if (Object.keys(cluster.workers ?? {}).length === 0) process.exit(failed ? 1 : 0);
  });

  for (const sig of ['SIGINT', 'SIGTERM'] as const) {
    process.once(sig, () => {
      for (const w of Object.values(cluster.workers ?? {})) w?.process.kill(sig);
    });
  }
}

function main() {
  const bind = process.env.BIND ?? '0.0.0.0:8000';
  const workers = Number(process.env.WEB_CONCURRENCY ?? 1);

  if (cluster.isPrimary && Number.isInteger(workers) && workers > 1) {
    startCluster(workers);
    return;
  }

  serve(bind).catch((err: unknown) => {
    console.error('❌ server failed to start', err);
    process.exit(1);
  });
}

// Only when run directly: node dist/src/server.js
if (process.argv[1] && /server(\.[cm]?[jt]s)?$/i.test(process.argv[1])) {
  main();
}
