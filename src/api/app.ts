import express from 'express';
import type { ErrorRequestHandler, Express, Response } from 'express';
import type { ServerConfig } from '../config/server.js';
import type { SessionManager } from '../core/session_manager.js';
import { checkStoreHealth, type KeyValueStore } from '../core/session_store.js';
import type { Logger } from '../util/logging.js';
import { snapshot } from '../util/metrics.js';
import { sessionsRouter } from './routes.js';

export interface AppDeps {
  manager: SessionManager;
  store: KeyValueStore;
  log: Logger;
  config: ServerConfig;
}

function resOnFinish(res: Response, cb: () => void) {
  res.once('finish', cb);
}

export function createApp({ manager, store, log, config }: AppDeps): Express {
  const app = express();
  const anyOrigin = config.corsOrigins.includes('*');

  app.use(express.json({ limit: '512kb' }));

  app.use((req, res, next) => {
    const origin = req.header('Origin');
    if (anyOrigin) {
      res.header('Access-Control-Allow-Origin', '*');
    } else if (origin && config.corsOrigins.includes(origin)) {
      res.header('Access-Control-Allow-Origin', origin);
      res.header('Vary', 'Origin');
    }
    res.header('Access-Control-Allow-Methods', 'GET, POST, PUT, DELETE, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization, X-User-ID');
    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
    } else {
      next();
    }
  });

  // Basic request logging
  app.use((req, res, next) => {
    const start = Date.now();
    log.debug({ method: req.method, path: req.path }, 'req:start');
    resOnFinish(res, () => {
      const ms = Date.now() - start;
      log.debug({ method: req.method, path: req.path, status: res.statusCode, ms }, 'req:done');
    });
    next();
  });

  app.get('/health', async (_req, res) => {
    const storeHealth = await checkStoreHealth(store).catch((err: unknown) => {
      log.warn({ err }, 'store health check failed');
      return 'degraded' as const;
    });
    res.status(storeHealth === 'ok' ? 200 : 503).json({
      status: storeHealth === 'ok' ? 'healthy' : 'degraded',
      service: config.serviceName,
      version: config.serviceVersion,
      store: storeHealth,
    });
  });

  app.get('/', (_req, res) => {
    res.json({
      service: config.serviceName,
      version: config.serviceVersion,
      status: 'running',
      endpoints: {
        health: '/health',
        metrics: '/metrics',
        sessions: `${config.apiPrefix}/sessions`,
      },
    });
  });

  app.get('/metrics', (_req, res) => {
    res.json(snapshot());
  });

  app.use(`${config.apiPrefix}/sessions`, sessionsRouter(manager, log));

  app.use((_req, res) => {
    res.status(404).json({ error: 'not_found', message: 'Route not found' });
  });

  const onError: ErrorRequestHandler = (err: unknown, _req, res, next) => {
    if (res.headersSent) return next(err);
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'invalid_request', details: { message: 'Malformed JSON body' } });
      return;
    }
    log.error({ err }, 'unhandled request error');
    res.status(500).json({ error: 'internal_error', message: 'Internal server error' });
  };
  app.use(onError);

  return app;
}
