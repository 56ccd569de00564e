import { SessionConfigSchema } from '../../../../src/config/session.js';
import { StoreUnavailableError } from '../../../../src/core/errors.js';
import { createClient, createSentinel } from 'redis';
import {
  buildClientOptions,
  buildSentinelOptions,
  createRedisStore,
} from '../../../../src/core/stores/redis.js';
import { silentLogger } from '../../../helpers/http.js';

function makeMockClient() {
  const multi = {
    set: jest.fn().mockReturnThis(),
    del: jest.fn().mockReturnThis(),
    sAdd: jest.fn().mockReturnThis(),
    sRem: jest.fn().mockReturnThis(),
    expire: jest.fn().mockReturnThis(),
    exec: jest.fn().mockResolvedValue([]),
  };
  const client = {
    isReady: false,
    isOpen: false,
    on: jest.fn(),
    connect: jest.fn(),
    close: jest.fn().mockResolvedValue(undefined),
    get: jest.fn(),
    set: jest.fn().mockResolvedValue('OK'),
    del: jest.fn(),
    sAdd: jest.fn().mockResolvedValue(1),
    sRem: jest.fn().mockResolvedValue(1),
    sMembers: jest.fn(),
    sCard: jest.fn(),
    expire: jest.fn(),
    ping: jest.fn(),
    multi: jest.fn(() => multi),
  };
  client.connect.mockImplementation(async () => {
    client.isReady = true;
    client.isOpen = true;
  });
  return { client, multi };
}

let mockRedis = makeMockClient();

jest.mock('redis', () => ({
  createClient: jest.fn(() => mockRedis.client),
  createSentinel: jest.fn(() => mockRedis.client),
}));

const config = (overrides: Record<string, unknown> = {}) =>
  SessionConfigSchema.parse({ kind: 'redis', ...overrides });

describe('buildClientOptions', () => {
  it('prefers REDIS_URL', () => {
    expect(buildClientOptions(config({ redisUrl: 'redis://cache:6380/2' }))).toEqual({
      url: 'redis://cache:6380/2',
      socket: { connectTimeout: 2000 },
    });
  });

  it('falls back to host, port, db and password', () => {
    expect(buildClientOptions(config({ redisPassword: 'test-secret' }))).toEqual({
      socket: { host: 'localhost', port: 6379, connectTimeout: 2000 },
      database: 1,
      password: 'test-secret',
    });
  });

  it('enables TLS when asked', () => {
    const options = buildClientOptions(config({ redisHost: 'cache', redisTls: 'true' }));
    expect(options.socket).toEqual({ host: 'cache', port: 6379, tls: true, connectTimeout: 2000 });
  });
});

describe('buildSentinelOptions', () => {
  it('names the master set and the sentinel nodes', () => {
    const cfg = config({
      redisMode: 'sentinel',
      redisSentinelHosts: 'sentinel-a:26379,sentinel-b:26380',
      redisMasterSet: 'sessions',
      redisPassword: 'test-secret',
    });
    expect(buildSentinelOptions(cfg)).toEqual({
      name: 'sessions',
      sentinelRootNodes: [
        { host: 'sentinel-a', port: 26379 },
        { host: 'sentinel-b', port: 26380 },
      ],
      nodeClientOptions: {
        socket: { connectTimeout: 2000 },
        database: 1,
        password: 'test-secret',
      },
    });
  });

  it('carries TLS to the data nodes', () => {
    const cfg = config({ redisMode: 'sentinel', redisSentinelHosts: 'sentinel-a', redisTls: true });
    expect(buildSentinelOptions(cfg).nodeClientOptions?.socket).toEqual({ tls: true, connectTimeout: 2000 });
  });
});

describe('RedisStore', () => {
  beforeEach(() => {
    mockRedis = makeMockClient();
    jest.mocked(createClient).mockClear();
    jest.mocked(createSentinel).mockClear();
  });

  it('uses a standalone client by default', () => {
    createRedisStore(config(), silentLogger());
    expect(createClient).toHaveBeenCalledTimes(1);
    expect(createSentinel).not.toHaveBeenCalled();
  });

  it('uses a Sentinel-managed client in sentinel mode', async () => {
    mockRedis.client.get.mockResolvedValue('payload');
    const cfg = config({ redisMode: 'sentinel', redisSentinelHosts: 'sentinel-a:26379', redisMasterSet: 'sessions' });
    const store = createRedisStore(cfg, silentLogger());

    expect(createClient).not.toHaveBeenCalled();
    expect(createSentinel).toHaveBeenCalledWith(buildSentinelOptions(cfg));
    expect(await store.get('session:a')).toBe('payload');
    expect(mockRedis.client.connect).toHaveBeenCalledTimes(1);
  });

  it('registers an error listener', () => {
    createRedisStore(config(), silentLogger());
    expect(mockRedis.client.on).toHaveBeenCalledWith('error', expect.any(Function));
  });

  it('connects lazily and only once', async () => {
    mockRedis.client.get.mockResolvedValue('payload');
    const store = createRedisStore(config(), silentLogger());
    expect(mockRedis.client.connect).not.toHaveBeenCalled();

    const [a, b] = await Promise.all([store.get('session:a'), store.get('session:b')]);
    await store.get('session:c');

    expect(a).toBe('payload');
    expect(b).toBe('payload');
    expect(mockRedis.client.connect).toHaveBeenCalledTimes(1);
  });

  it('retries the connection after a failed attempt', async () => {
    mockRedis.client.connect.mockRejectedValueOnce(new Error('ECONNREFUSED'));
    mockRedis.client.sCard.mockResolvedValue(3);
    const store = createRedisStore(config(), silentLogger());

    await expect(store.sCard('user_sessions:u')).rejects.toBeInstanceOf(StoreUnavailableError);
    expect(await store.sCard('user_sessions:u')).toBe(3);
    expect(mockRedis.client.connect).toHaveBeenCalledTimes(2);
  });

  it('maps commands onto the client', async () => {
    mockRedis.client.del.mockResolvedValue(1);
    mockRedis.client.sMembers.mockResolvedValue(['a', 'b']);
    mockRedis.client.expire.mockResolvedValueOnce(1).mockResolvedValueOnce(0);
    const store = createRedisStore(config(), silentLogger());

    await store.set('session:a', '{}', 60);
    expect(mockRedis.client.set).toHaveBeenCalledWith('session:a', '{}', { expiration: { type: 'EX', value: 60 } });
    expect(await store.del('session:a')).toBe(1);
    await store.sAdd('user_sessions:u', 'a');
    expect(mockRedis.client.sAdd).toHaveBeenCalledWith('user_sessions:u', 'a');
    await store.sRem('user_sessions:u', 'a');
    expect(mockRedis.client.sRem).toHaveBeenCalledWith('user_sessions:u', 'a');
    expect(await store.sMembers('user_sessions:u')).toEqual(['a', 'b']);
    expect(await store.expire('user_sessions:u', 60)).toBe(true);
    expect(await store.expire('user_sessions:gone', 60)).toBe(false);
    expect(mockRedis.client.expire).toHaveBeenCalledWith('user_sessions:u', 60);
  });

  it('runs batches through MULTI in order', async () => {
    const store = createRedisStore(config(), silentLogger());
    await store.exec?.([
      { op: 'set', key: 'session:a', value: '{}', ttlSec: 60 },
      { op: 'sAdd', key: 'user_sessions:u', member: 'a' },
      { op: 'expire', key: 'user_sessions:u', ttlSec: 60 },
    ]);

    const { multi } = mockRedis;
    expect(multi.set).toHaveBeenCalledWith('session:a', '{}', { expiration: { type: 'EX', value: 60 } });
    expect(multi.sAdd).toHaveBeenCalledWith('user_sessions:u', 'a');
    expect(multi.expire).toHaveBeenCalledWith('user_sessions:u', 60);
    expect(multi.set.mock.invocationCallOrder[0]).toBeLessThan(multi.sAdd.mock.invocationCallOrder[0]);
    expect(multi.sAdd.mock.invocationCallOrder[0]).toBeLessThan(multi.expire.mock.invocationCallOrder[0]);
    expect(multi.exec).toHaveBeenCalledTimes(1);
  });

  it('wraps command errors', async () => {
    mockRedis.client.get.mockRejectedValue(new Error('READONLY'));
    const store = createRedisStore(config(), silentLogger());

    const err = await store.get('session:a').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StoreUnavailableError);
    expect(err).toMatchObject({ message: 'redis get failed', operation: 'get' });
  });

  it('times out slow commands', async () => {
    mockRedis.client.get.mockReturnValue(new Promise(() => undefined));
    const store = createRedisStore(config({ timeoutMs: 100 }), silentLogger());

    await expect(store.get('session:a')).rejects.toThrow('redis get timed out after 100ms');
  });

  it('reports health through ping', async () => {
    mockRedis.client.ping.mockResolvedValueOnce('PONG').mockRejectedValueOnce(new Error('down'));
    const store = createRedisStore(config(), silentLogger());

    expect(await store.ping()).toBe(true);
    expect(await store.ping()).toBe(false);
  });

  it('closes only an open client', async () => {
    const store = createRedisStore(config(), silentLogger());
    await store.close();
    expect(mockRedis.client.close).not.toHaveBeenCalled();

    mockRedis.client.get.mockResolvedValue(null);
    await store.get('session:a');
    await store.close();
    expect(mockRedis.client.close).toHaveBeenCalledTimes(1);
  });
});
