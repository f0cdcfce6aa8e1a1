import path from 'node:path';

export const DEFAULT_SIGNING_SECRET = 'change-me-insecure-default-secret';
export const DEFAULT_ADMIN_PASSWORD = 'admin123';
const DEFAULT_PORT = 8080;
const DEFAULT_TOKEN_TTL_SECONDS = 24 * 60 * 60;
const DEFAULT_LOGIN_RATE_LIMIT_MAX = 20;
const DEFAULT_AUDIT_RETENTION_DAYS = 90;

export interface AppConfig {
  serveDir: string;
  port: number;
  signingSecret: string;
  adminPassword: string;
  dbPath: string;
  auditDir: string;
  auditRetentionDays: number;
  tokenTtlSeconds: number;
  loginRateLimitMax: number;
  staticDir: string;
}

export interface LoadedConfig {
  config: AppConfig;
  warnings: string[];
}

type Env = Record<string, string | undefined>;

function readTrimmed(env: Env, key: string): string | undefined {
  const raw = env[key];
  if (typeof raw !== 'string') {
    return undefined;
  }
  const value = raw.trim();
  return value.length > 0 ? value : undefined;
}

function readPositiveInt(env: Env, key: string, fallback: number, warnings: string[]): number {
  const raw = readTrimmed(env, key);
  if (raw === undefined) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0 || String(parsed) !== raw) {
    warnings.push(`invalid ${key}=${raw}, fallback to ${fallback}`);
    return fallback;
  }
  return parsed;
}

function resolveDbPath(raw: string | undefined): string {
  if (raw === ':memory:') {
    return raw;
  }
  return path.resolve(raw ?? 'filebrowser.db');
}

export function loadConfig(env: Env = process.env): LoadedConfig {
  const warnings: string[] = [];

  const port = readPositiveInt(env, 'PORT', DEFAULT_PORT, warnings);
  if (port > 65535) {
    warnings.push(`invalid PORT=${port}, fallback to ${DEFAULT_PORT}`);
  }

  let signingSecret = readTrimmed(env, 'JWT_SECRET');
  if (!signingSecret) {
    signingSecret = DEFAULT_SIGNING_SECRET;
    warnings.push('using default token signing secret, set JWT_SECRET in production');
  }

  let adminPassword = readTrimmed(env, 'ADMIN_PASSWORD');
  if (!adminPassword) {
    adminPassword = DEFAULT_ADMIN_PASSWORD;
    warnings.push(`using default admin password '${DEFAULT_ADMIN_PASSWORD}', set ADMIN_PASSWORD`);
  }

  return {
    config: {
      serveDir: path.resolve(readTrimmed(env, 'SERVE_DIR') ?? './data'),
      port: port > 65535 ? DEFAULT_PORT : port,
      signingSecret,
      adminPassword,
      dbPath: resolveDbPath(readTrimmed(env, 'DB_PATH')),
      auditDir: path.resolve(readTrimmed(env, 'AUDIT_DIR') ?? '.treeserve-audit'),
      auditRetentionDays: readPositiveInt(env, 'AUDIT_RETENTION_DAYS', DEFAULT_AUDIT_RETENTION_DAYS, warnings),
      tokenTtlSeconds: readPositiveInt(env, 'TOKEN_TTL_SECONDS', DEFAULT_TOKEN_TTL_SECONDS, warnings),
      loginRateLimitMax: readPositiveInt(env, 'LOGIN_RATE_LIMIT_MAX', DEFAULT_LOGIN_RATE_LIMIT_MAX, warnings),
      staticDir: path.resolve(readTrimmed(env, 'STATIC_DIR') ?? './public')
    },
    warnings
  };
}
