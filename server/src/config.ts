import { z } from 'zod';

const EnvSchema = z.object({
  APP_NAME: z.string().default('Calculator WebApp'),
  ENV: z.string().default('development'),
  DEBUG: z.string().default('false').transform((v) => v.toLowerCase() === 'true'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  CORS_ORIGIN: z.string().default('*'),
});

export type ServerConfig = Readonly<{
  appName: string;
  env: string;
  debug: boolean;
  host: string;
  port: number;
  corsOrigin: string;
}>

export class ConfigError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }
  const { APP_NAME, ENV, DEBUG, HOST, PORT, CORS_ORIGIN } = parsed.data;
  return Object.freeze({
    appName: APP_NAME,
    env: ENV,
    debug: DEBUG,
    host: HOST,
    port: PORT,
    corsOrigin: CORS_ORIGIN,
  });
}
