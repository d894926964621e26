/**
 * Environment variable handling with validation
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type NodeEnv = 'development' | 'production' | 'test';

export interface EnvConfig {
  databasePath: string;
  rateTableBaseUrl: string | null;
  quoteChartBaseUrl: string | null;
  httpTimeoutMs: number | null;
  logLevel: LogLevel;
  nodeEnv: NodeEnv;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];

function getEnvVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function parseLogLevel(raw: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === raw) ?? 'info';
}

function parseNodeEnv(raw: string | undefined): NodeEnv {
  return NODE_ENVS.find((value) => value === raw) ?? 'development';
}

function parsePositiveInt(name: string, raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return parsed;
}

export interface LoggingEnv {
  level: LogLevel;
  /** Human-readable output through pino-pretty outside production and tests. */
  pretty: boolean;
}

/**
 * Logging settings only. Kept apart from loadEnvConfig so that importing the
 * logger never fails on an unrelated bad variable.
 */
export function loadLoggingEnv(env: NodeJS.ProcessEnv = process.env): LoggingEnv {
  const nodeEnv = parseNodeEnv(getEnvVar(env, 'NODE_ENV'));
  const raw = getEnvVar(env, 'LOG_LEVEL');
  const level = raw === undefined && nodeEnv === 'test' ? 'silent' : parseLogLevel(raw);
  return { level, pretty: nodeEnv === 'development' };
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return {
    databasePath: getEnvVar(env, 'DATABASE_PATH') ?? 'data/portfolio.db',
    rateTableBaseUrl: getEnvVar(env, 'RATE_TABLE_BASE_URL') ?? null,
    quoteChartBaseUrl: getEnvVar(env, 'QUOTE_CHART_BASE_URL') ?? null,
    httpTimeoutMs: parsePositiveInt('HTTP_TIMEOUT_MS', getEnvVar(env, 'HTTP_TIMEOUT_MS')),
    logLevel: parseLogLevel(getEnvVar(env, 'LOG_LEVEL')),
    nodeEnv: parseNodeEnv(getEnvVar(env, 'NODE_ENV')),
  };
}
