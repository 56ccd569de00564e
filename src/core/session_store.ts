import type { SessionConfig } from '../config/session.js';
import type { Logger } from '../util/logging.js';
import type { KeyValueStore } from './kv.js';
import { createInMemoryStore } from './stores/inmemory.js';
import { createRedisStore } from './stores/redis.js';

export type { KeyValueStore } from './kv.js';

/**
 * Builds the store named by cfg.kind. The caller owns the returned handle and
 * must close() it on shutdown.
 */
export function createStore(cfg: SessionConfig, log: Logger): KeyValueStore {
  if (cfg.kind === 'memory') {
    log.warn('in-memory session store selected; sessions are lost on restart');
    return createInMemoryStore();
  }
  return createRedisStore(cfg, log);
}

export type StoreHealth = 'ok' | 'degraded';

export async function checkStoreHealth(store: KeyValueStore): Promise<StoreHealth> {
  return (await store.ping()) ? 'ok' : 'degraded';
}
