import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { logger as defaultLogger, type Logger, type LogLevel } from '../core/logger.js';
import { resolveSentinels } from '../core/sentinels.js';

// Like ${VAR:-default} in a shell: blank values fall back to the default
const blank = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const text = (fallback: string) => blank.pipe(z.string().default(fallback));

const envSchema = z.object({
  PORT: blank.pipe(z.coerce.number().int().min(1).max(65535).default(8000)),
  HOST: text('0.0.0.0'),
  DATA_DIR: text('data'),
  CACHE_SENTINELS: text('about_cache.txt,faq_cache.json')
    .transform((value) =>
      value
        .split(',')
        .map((name) => name.trim())
        .filter((name) => name.length > 0),
    )
    .pipe(z.array(z.string()).min(1, 'at least one sentinel file is required')),
  INTERPRETER: text('python3'),
  INGEST_SCRIPT: text('ingestion.py'),
  SERVER_MODULE: text('uvicorn'),
  APP_TARGET: text('webhook:app'),
  SERVER_LOG_LEVEL: text('info'),
  LOG_LEVEL: blank,
  INGEST_LOCK: blank,
});

// Only read when INGEST_LOCK=postgres
const lockSchema = z.object({
  DATABASE_URL: blank.pipe(z.string({ required_error: 'required when INGEST_LOCK=postgres' }).url()),
  INGEST_LOCK_KEY: blank.pipe(z.coerce.number().int().default(727001)),
});

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

type Env = z.infer<typeof envSchema>;

export type IngestLockConfig = { kind: 'none' } | { kind: 'postgres'; databaseUrl: string; key: number };

export interface BootConfig {
  port: number;
  host: string;
  dataDir: string;
  /** Absolute paths of the sentinel files. */
  sentinels: string[];
  interpreter: string;
  ingestScript: string;
  serverModule: string;
  appTarget: string;
  serverLogLevel: string;
  logLevel: LogLevel;
  ingestLock: IngestLockConfig;
}

function toLogLevel(value: string | undefined, log: Logger): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (value !== undefined && !level) {
    log.warn('Unknown LOG_LEVEL, using info', { value });
  }
  return level ?? 'info';
}

// The lock is optional, so bad lock settings disable it instead of stopping the boot
function toLockConfig(env: Env, source: NodeJS.ProcessEnv, log: Logger): IngestLockConfig {
  if (env.INGEST_LOCK === undefined || env.INGEST_LOCK === 'none') {
    return { kind: 'none' };
  }
  if (env.INGEST_LOCK !== 'postgres') {
    log.warn('Unknown INGEST_LOCK, running without ingestion lock', { value: env.INGEST_LOCK });
    return { kind: 'none' };
  }

  const parsed = lockSchema.safeParse(source);
  if (!parsed.success) {
    log.warn('Invalid ingestion lock settings, running without ingestion lock', {
      issues: formatIssues(parsed.error),
    });
    return { kind: 'none' };
  }
  return { kind: 'postgres', databaseUrl: parsed.data.DATABASE_URL, key: parsed.data.INGEST_LOCK_KEY };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Parses the environment into a BootConfig.
 *
 * Settings the server handoff depends on are fatal when invalid. LOG_LEVEL and
 * the ingestion lock settings fall back to safe values with a warning.
 */
export function loadConfig(
  source: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
  log: Logger = defaultLogger,
): BootConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }

  const env = parsed.data;
  const dataDir = resolve(cwd, env.DATA_DIR);

  return {
    port: env.PORT,
    host: env.HOST,
    dataDir,
    sentinels: resolveSentinels(dataDir, env.CACHE_SENTINELS),
    interpreter: env.INTERPRETER,
    ingestScript: env.INGEST_SCRIPT,
    serverModule: env.SERVER_MODULE,
    appTarget: env.APP_TARGET,
    serverLogLevel: env.SERVER_LOG_LEVEL,
    logLevel: toLogLevel(env.LOG_LEVEL, log),
    ingestLock: toLockConfig(env, source, log),
  };
}
