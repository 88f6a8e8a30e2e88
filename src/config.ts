import 'dotenv/config';
import { BootstrapError } from './errors.js';

export type BaselinePolicy = 'stamp' | 'upgrade' | 'fail';

export type ColumnRef = { table: string; column: string };

export type RetryOptions = {
  attempts: number;
  baseMs: number;
  maxMs: number;
};

export type BootstrapConfig = {
  databaseUrl: string;
  baseline: BaselinePolicy;
  preflight: boolean;
  verifySchema: boolean;
  requiredColumns: ColumnRef[];
  lockKey: number;
  lockWaitMs: number;
  retry: RetryOptions;
  connectTimeoutMs: number;
  statementTimeoutMs: number;
  bind: string;
  workers: number;
  serviceCommand?: string[];
};

export const DEFAULT_REQUIRED_COLUMNS = 'users.is_deleted,users.updated_at,users.created_at';

const BASELINE_POLICIES: readonly BaselinePolicy[] = ['stamp', 'upgrade', 'fail'];

type Env = Record<string, string | undefined>;

function configError(message: string): BootstrapError {
  return new BootstrapError('config', 'CHECKING_TOOLING', message);
}

function req(env: Env, name: string): string {
  const v = env[name];
  if (!v) throw configError(`Missing env: ${name}`);
  return v;
}

function flag(env: Env, name: string, fallback: boolean): boolean {
  const v = env[name]?.trim().toLowerCase();
  if (!v) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(v)) return true;
  if (['0', 'false', 'no', 'off'].includes(v)) return false;
  throw configError(`Invalid boolean in env ${name}: ${v}`);
}

function int(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const n = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(n) || n < min) {
    throw configError(`Invalid integer in env ${name}: ${raw}`);
  }
  return n;
}

function baselinePolicy(env: Env): BaselinePolicy {
  const v = (env.MIGRATION_BASELINE ?? 'stamp').trim().toLowerCase();
  const found = BASELINE_POLICIES.find((p) => p === v);
  if (!found) {
    throw configError(`Invalid MIGRATION_BASELINE: ${v} (expected ${BASELINE_POLICIES.join('|')})`);
  }
  return found;
}

export function parseRequiredColumns(raw: string): ColumnRef[] {
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
    .map((entry) => {
      const dot = entry.indexOf('.');
      if (dot <= 0 || dot === entry.length - 1) {
        throw configError(`Invalid REQUIRED_COLUMNS entry: ${entry} (expected table.column)`);
      }
      return { table: entry.slice(0, dot), column: entry.slice(dot + 1) };
    });
}

export function parseBind(bind: string): { host: string; port: number } {
  const idx = bind.lastIndexOf(':');
  const host = idx > 0 ? bind.slice(0, idx) : '0.0.0.0';
  const rawPort = idx >= 0 ? bind.slice(idx + 1) : bind;
  const port = /^\d+$/.test(rawPort) ? Number(rawPort) : NaN;
  if (!Number.isInteger(port) || port > 65535) {
    throw configError(`Invalid BIND: ${bind}`);
  }
  return { host, port };
}

export function loadConfig(env: Env = process.env): BootstrapConfig {
  const bind = env.BIND?.trim() || '0.0.0.0:8000';
  parseBind(bind);

  const serviceCommand = env.SERVICE_COMMAND?.trim();

  return {
    databaseUrl: req(env, 'DATABASE_URL'),
    baseline: baselinePolicy(env),
    preflight: flag(env, 'PREFLIGHT', true),
    verifySchema: flag(env, 'VERIFY_SCHEMA', true),
    requiredColumns: parseRequiredColumns(env.REQUIRED_COLUMNS ?? DEFAULT_REQUIRED_COLUMNS),
    lockKey: int(env, 'MIGRATION_LOCK_KEY', 7343001),
    lockWaitMs: int(env, 'MIGRATION_LOCK_WAIT_MS', 600_000),
    retry: {
      attempts: int(env, 'DB_RETRY_ATTEMPTS', 5, 1),
      baseMs: int(env, 'DB_RETRY_BASE_MS', 500),
      maxMs: int(env, 'DB_RETRY_MAX_MS', 10_000),
    },
    connectTimeoutMs: int(env, 'DB_CONNECT_TIMEOUT_MS', 10_000),
    statementTimeoutMs: int(env, 'DB_STATEMENT_TIMEOUT_MS', 60_000),
    bind,
    workers: int(env, 'WEB_CONCURRENCY', 3, 1),
    serviceCommand: serviceCommand ? serviceCommand.split(/\s+/) : undefined,
  };
}
