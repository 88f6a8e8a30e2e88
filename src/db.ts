import pg from 'pg';

export type QueryRow = Record<string, unknown>;

/** The slice of pg's Pool / PoolClient the migration store needs. */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<{ rows: QueryRow[] }>;
}

export function stringField(row: QueryRow | undefined, key: string): string | undefined {
  const v = row?.[key];
  return typeof v === 'string' ? v : undefined;
}

export interface ConnectionSource extends Queryable {
  connect(): Promise<Queryable & { release(err?: Error | boolean): void }>;
  end(): Promise<void>;
}

export function needsSsl(conn?: string) {
  if (!conn) return false;

  try {
    const u = new URL(conn);
    const host = (u.hostname || '').toLowerCase();

    if (host === 'localhost' || host === '127.0.0.1' || host === '::1') return false;
    if (u.searchParams.get('sslmode') === 'disable') return false;

    return true;
  } catch {
    // unparsable as a URL (e.g. key=value form): leave SSL to libpq-style params
    return false;
  }
}

export function createPool(opts: {
  connectionString: string;
  connectTimeoutMs: number;
  statementTimeoutMs: number;
}): pg.Pool {
  return new pg.Pool({
    connectionString: opts.connectionString,
    ssl: needsSsl(opts.connectionString) ? { rejectUnauthorized: false } : undefined,
    max: 2,
    connectionTimeoutMillis: opts.connectTimeoutMs,
    statement_timeout: opts.statementTimeoutMs,
    application_name: 'petcare-bootstrap',
  });
}
