import { z } from 'zod';

export const ServerConfigSchema = z.object({
  serviceName: z.string().min(1).default('session-service'),
  serviceVersion: z.string().min(1).default('1.0.0'),
  host: z.string().min(1).default('0.0.0.0'),
  port: z.coerce.number().int().min(0).max(65535).default(8002),
  apiPrefix: z
    .string()
    .regex(/^\/[\w\-/]*$/, 'must start with /')
    .transform((prefix) => prefix.replace(/\/+$/, ''))
    .default('/api/v1'),
  corsOrigins: z.array(z.string().min(1)).min(1).default(['*']),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return ServerConfigSchema.parse({
    serviceName: env.SERVICE_NAME || undefined,
    serviceVersion: env.SERVICE_VERSION || undefined,
    host: env.HOST || undefined,
    port: env.PORT || undefined,
    apiPrefix: env.API_PREFIX || undefined,
    corsOrigins: env.CORS_ORIGINS
      ? env.CORS_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean)
      : undefined,
  });
}
