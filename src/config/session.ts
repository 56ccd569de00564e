import { z } from 'zod';

const Flag = z
  .union([z.boolean(), z.string()])
  .transform((value) => (typeof value === 'boolean' ? value : ['1', 'true', 'yes'].includes(value.toLowerCase())));

export interface SentinelNode {
  host: string;
  port: number;
}

const DEFAULT_SENTINEL_PORT = 26379;

/** "host:port,host" → nodes; a missing port means the Sentinel default. */
const SentinelHosts = z.string().transform((value, ctx): SentinelNode[] => {
  const nodes: SentinelNode[] = [];
  for (const entry of value.split(',').map((part) => part.trim()).filter(Boolean)) {
    const [host, rawPort] = entry.split(':');
    const port = rawPort === undefined ? DEFAULT_SENTINEL_PORT : Number(rawPort);
    if (!host || !Number.isInteger(port) || port < 1 || port > 65535) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid sentinel host: ${entry}` });
      return z.NEVER;
    }
    nodes.push({ host, port });
  }
  return nodes;
});

export const SessionConfigSchema = z
  .object({
    kind: z.enum(['redis', 'memory']).default('redis'),
    ttlSec: z.coerce.number().int().min(60).default(604800),
    maxSessionsPerUser: z.coerce.number().int().min(1).default(50),
    timeoutMs: z.coerce.number().int().min(100).default(2000),
    redisMode: z.enum(['standalone', 'sentinel']).default('standalone'),
    redisUrl: z.string().url().optional(),
    redisHost: z.string().min(1).default('localhost'),
    redisPort: z.coerce.number().int().min(1).max(65535).default(6379),
    redisDb: z.coerce.number().int().min(0).default(1),
    redisPassword: z.string().optional(),
    redisTls: Flag.default(false),
    redisSentinelHosts: SentinelHosts.default(''),
    redisMasterSet: z.string().min(1).default('mymaster'),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.kind === 'redis' && cfg.redisMode === 'sentinel' && cfg.redisSentinelHosts.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['redisSentinelHosts'],
        message: 'REDIS_SENTINEL_HOSTS is required when REDIS_MODE=sentinel',
      });
    }
  });

export type SessionConfig = z.infer<typeof SessionConfigSchema>;

export function loadSessionConfig(env: NodeJS.ProcessEnv = process.env): SessionConfig {
  return SessionConfigSchema.parse({
    kind: env.SESSION_STORE || 'redis',
    ttlSec: env.SESSION_TTL_SEC || 604800,
    maxSessionsPerUser: env.MAX_SESSIONS_PER_USER || 50,
    timeoutMs: env.SESSION_ADAPTER_TIMEOUT_MS || 2000,
    redisMode: env.REDIS_MODE || 'standalone',
    redisUrl: env.REDIS_URL || undefined,
    redisHost: env.REDIS_HOST || 'localhost',
    redisPort: env.REDIS_PORT || 6379,
    redisDb: env.REDIS_DB || 1,
    redisPassword: env.REDIS_PASSWORD || undefined,
    redisTls: env.REDIS_SSL || false,
    redisSentinelHosts: env.REDIS_SENTINEL_HOSTS || '',
    redisMasterSet: env.REDIS_MASTER_SET || 'mymaster',
  });
}
