import { z } from 'zod';
import { ConfigError } from './errors';

const DEFAULT_DATABASE_PATH = 'data/jobsignal.db';

const loggingSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_FILE: z.string().min(1).optional(),
});

const envSchema = z.object({
  DATABASE_PATH: z.string().min(1).default(DEFAULT_DATABASE_PATH),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  PORT: z.coerce.number().int().min(1).max(65_535).default(3001),
  JOB_PROFILE_PATH: z.string().min(1).optional(),
}).merge(loggingSchema);

export type LogLevel = z.infer<typeof loggingSchema>['LOG_LEVEL'];

export interface LoggingConfig {
  logLevel: LogLevel;
  logFile: string | null;
}

export interface AppConfig extends LoggingConfig {
  databasePath: string;
  fetchTimeoutMs: number;
  port: number;
  jobProfilePath: string | null;
}

// Empty strings in .env files mean "unset".
function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value.trim();
  }
  return out;
}

function parseEnv<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, env: NodeJS.ProcessEnv): T {
  const parsed = schema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError('Invalid configuration', issues);
  }
  return parsed.data;
}

/** The subset the root logger is built from; read once when logging starts. */
export function loadLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const values = parseEnv(loggingSchema, env);
  return { logLevel: values.LOG_LEVEL, logFile: values.LOG_FILE ?? null };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const values = parseEnv(envSchema, env);
  return {
    databasePath: values.DATABASE_PATH,
    fetchTimeoutMs: values.FETCH_TIMEOUT_MS,
    port: values.PORT,
    jobProfilePath: values.JOB_PROFILE_PATH ?? null,
    logLevel: values.LOG_LEVEL,
    logFile: values.LOG_FILE ?? null,
  };
}
