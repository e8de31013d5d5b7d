import { z } from 'zod';

const OutputEnvSchema = z.object({
  METRICS_OUTPUT_DIR: z.string().min(1).default('site'),
});

const EnvSchema = OutputEnvSchema.extend({
  GITHUB_TOKEN: z.string().default(''),
  GITHUB_REPOSITORY: z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'Expected "owner/name"'),
  METRICS_WINDOW_DAYS: z.coerce.number().int().positive().default(30),
});

export type OutputConfig = Readonly<{
  outputDir: string;
}>

export type MetricsConfig = OutputConfig & Readonly<{
  token: string;
  repository: string;
  windowDays: number;
}>

export class ConfigError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}

/** Only the output directory; used by the dashboard renderer, which needs no GitHub access. */
export function loadOutputConfig(env: NodeJS.ProcessEnv = process.env): OutputConfig {
  const parsed = OutputEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }
  return Object.freeze({ outputDir: parsed.data.METRICS_OUTPUT_DIR });
}

export function loadMetricsConfig(env: NodeJS.ProcessEnv = process.env): MetricsConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }
  return Object.freeze({
    token: parsed.data.GITHUB_TOKEN,
    repository: parsed.data.GITHUB_REPOSITORY,
    windowDays: parsed.data.METRICS_WINDOW_DAYS,
    outputDir: parsed.data.METRICS_OUTPUT_DIR,
  });
}
