import { createClient, createSentinel, type RedisClientOptions } from 'redis';
import type { SessionConfig } from '../../config/session.js';
import type { Logger } from '../../util/logging.js';
import { StoreUnavailableError } from '../errors.js';
import type { KeyValueStore, KvCommand } from '../kv.js';

type SentinelOptions = Parameters<typeof createSentinel>[0];

interface SetExpiry {
  expiration: { type: 'EX'; value: number };
}

interface RedisBatch {
  set(key: string, value: string, options: SetExpiry): unknown;
  del(key: string): unknown;
  sAdd(key: string, member: string): unknown;
  sRem(key: string, member: string): unknown;
  expire(key: string, seconds: number): unknown;
  exec(): Promise<unknown>;
}

/**
 * The part of a standalone client or a Sentinel-managed client this adapter
 * uses. Replies are narrowed at the call sites.
 */
interface RedisConnection {
  readonly isReady: boolean;
  readonly isOpen: boolean;
  connect(): Promise<unknown>;
  close(): Promise<unknown>;
  on(event: 'error', listener: (err: unknown) => void): unknown;
  get(key: string): Promise<unknown>;
  set(key: string, value: string, options: SetExpiry): Promise<unknown>;
  del(key: string): Promise<unknown>;
  sAdd(key: string, member: string): Promise<unknown>;
  sRem(key: string, member: string): Promise<unknown>;
  sMembers(key: string): Promise<unknown>;
  sCard(key: string): Promise<unknown>;
  expire(key: string, seconds: number): Promise<unknown>;
  ping(): Promise<unknown>;
  multi(): RedisBatch;
}

/**
 * Client options from config. REDIS_URL wins; otherwise host/port/db/password.
 */
export function buildClientOptions(cfg: SessionConfig): RedisClientOptions {
  const connectTimeout = cfg.timeoutMs;
  if (cfg.redisUrl) {
    return { url: cfg.redisUrl, socket: { connectTimeout } };
  }
  return {
    socket: cfg.redisTls
      ? { host: cfg.redisHost, port: cfg.redisPort, tls: true, connectTimeout }
      : { host: cfg.redisHost, port: cfg.redisPort, connectTimeout },
    database: cfg.redisDb,
    password: cfg.redisPassword,
  };
}

/**
 * Sentinel options from config: the master set name, the Sentinel nodes, and the
 * db/password/TLS settings applied to every data-node connection.
 */
export function buildSentinelOptions(cfg: SessionConfig): SentinelOptions {
  const connectTimeout = cfg.timeoutMs;
  return {
    name: cfg.redisMasterSet,
    sentinelRootNodes: cfg.redisSentinelHosts.map(({ host, port }) => ({ host, port })),
    nodeClientOptions: {
      socket: cfg.redisTls ? { tls: true, connectTimeout } : { connectTimeout },
      database: cfg.redisDb,
      password: cfg.redisPassword,
    },
  };
}

function connectionFor(cfg: SessionConfig): RedisConnection {
  return cfg.redisMode === 'sentinel'
    ? createSentinel(buildSentinelOptions(cfg))
    : createClient(buildClientOptions(cfg));
}

const expiry = (ttlSec: number): SetExpiry => ({ expiration: { type: 'EX', value: ttlSec } });

/**
 * Redis-backed store over a standalone or Sentinel-managed connection. Connects
 * lazily on first use; every command is bounded by cfg.timeoutMs and any failure
 * is rethrown as StoreUnavailableError.
 */
export function createRedisStore(cfg: SessionConfig, log: Logger): KeyValueStore {
  const client = connectionFor(cfg);
  let connecting: Promise<unknown> | undefined;

  client.on('error', (err: unknown) => {
    log.warn({ err, mode: cfg.redisMode }, 'redis client error');
  });

  async function getClient(): Promise<RedisConnection> {
    if (client.isReady) return client;
    if (!connecting) {
      connecting = client.connect().then(
        () => {
          log.info(
            cfg.redisMode === 'sentinel'
              ? { mode: 'sentinel', masterSet: cfg.redisMasterSet, sentinels: cfg.redisSentinelHosts, db: cfg.redisDb }
              : { mode: 'standalone', host: cfg.redisHost, port: cfg.redisPort, db: cfg.redisDb },
            'redis connection established',
          );
        },
        (err: unknown) => {
          connecting = undefined;
          throw err;
        },
      );
    }
    await connecting;
    return client;
  }

  async function withTimeout<T>(operation: string, run: (redis: RedisConnection) => Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new StoreUnavailableError(`redis ${operation} timed out after ${cfg.timeoutMs}ms`, operation)),
        cfg.timeoutMs,
      );
    });

    try {
      return await Promise.race([getClient().then(run), timeout]);
    } catch (err) {
      if (err instanceof StoreUnavailableError) throw err;
      throw new StoreUnavailableError(`redis ${operation} failed`, operation, { cause: err });
    } finally {
      clearTimeout(timer);
    }
  }

  return {
    async get(key) {
      const reply = await withTimeout('get', (redis) => redis.get(key));
      return typeof reply === 'string' ? reply : null;
    },

    async set(key, value, ttlSec) {
      await withTimeout('set', (redis) => redis.set(key, value, expiry(ttlSec)));
    },

    async del(key) {
      return Number(await withTimeout('del', (redis) => redis.del(key)));
    },

    async sAdd(key, member) {
      await withTimeout('sAdd', (redis) => redis.sAdd(key, member));
    },

    async sRem(key, member) {
      await withTimeout('sRem', (redis) => redis.sRem(key, member));
    },

    async sMembers(key) {
      const reply = await withTimeout('sMembers', (redis) => redis.sMembers(key));
      return Array.isArray(reply) ? reply.map(String) : [];
    },

    async sCard(key) {
      return Number(await withTimeout('sCard', (redis) => redis.sCard(key)));
    },

    async expire(key, ttlSec) {
      // 1 when the key exists, 0 otherwise
      return Number(await withTimeout('expire', (redis) => redis.expire(key, ttlSec))) === 1;
    },

    async exec(commands: KvCommand[]) {
      await withTimeout('exec', (redis) => {
        const multi = redis.multi();
        for (const command of commands) {
          switch (command.op) {
            case 'set':
              multi.set(command.key, command.value, expiry(command.ttlSec));
              break;
            case 'del':
              multi.del(command.key);
              break;
            case 'sAdd':
              multi.sAdd(command.key, command.member);
              break;
            case 'sRem':
              multi.sRem(command.key, command.member);
              break;
            case 'expire':
              multi.expire(command.key, command.ttlSec);
              break;
          }
        }
        return multi.exec();
      });
    },

    async ping() {
      try {
        const reply = await withTimeout('ping', (redis) => redis.ping());
        return reply === 'PONG';
      } catch (err) {
        log.warn({ err }, 'redis ping failed');
        return false;
      }
    },

    async close() {
      if (client.isOpen) {
        await client.close();
      }
    },
  };
}
