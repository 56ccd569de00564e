import 'dotenv/config';
import { loadServerConfig } from '../config/server.js';
import { loadSessionConfig } from '../config/session.js';
import { SessionManager } from '../core/session_manager.js';
import { createStore } from '../core/session_store.js';
import { createLogger } from '../util/logging.js';
import { createApp } from './app.js';

const log = createLogger();

const serverConfig = loadServerConfig();
const sessionConfig = loadSessionConfig();
const store = createStore(sessionConfig, log);
const manager = new SessionManager(
  store,
  { ttlSec: sessionConfig.ttlSec, maxSessionsPerUser: sessionConfig.maxSessionsPerUser },
  log,
);

log.info(
  { sessionStore: sessionConfig.kind, redisMode: sessionConfig.redisMode, ttlSec: sessionConfig.ttlSec, maxSessionsPerUser: sessionConfig.maxSessionsPerUser },
  'Session store initialized',
);

const app = createApp({ manager, store, log, config: serverConfig });

const server = app.listen(serverConfig.port, serverConfig.host, () => {
  log.info({ host: serverConfig.host, port: serverConfig.port, apiPrefix: serverConfig.apiPrefix }, 'HTTP server started');
});

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info({ signal }, 'shutting down');

  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
  await store.close();
  log.info('shutdown complete');
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ err }, 'shutdown failed');
        process.exit(1);
      });
  });
}
