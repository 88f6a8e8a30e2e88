import { stringField, type ConnectionSource, type Queryable } from './db.js';
import type { MigrationSet, MigrationUnit, Revision } from './migrations/index.js';
import { errorMessage } from './errors.js';
import { createStartupLog, type StartupLog } from './log.js';
import { backoffMs, sleep, type Sleep } from './retry.js';

/**
 * Migration state lives only in the database: one row in `schema_version`.
 * - table missing: never migrated
 * - table empty: at base
 * Nothing here caches it; every call re-reads.
 */

export type ServerInfo = { database: string; serverVersion: string };

export type UpgradeResult = { from: Revision; to: Revision; applied: string[] };

export interface MigrationStore {
  ping(): Promise<ServerInfo>;
  markerExists(): Promise<boolean>;
  currentRevision(): Promise<Revision>;
  /** Sets the marker without running any migration body. Creates the marker table if needed. */
  stamp(revision: Revision): Promise<void>;
  /**
   * Like `stamp`, but only when the marker table is still absent once the migration lock is held.
   * Resolves false when another instance created it first.
   */
  stampIfUnmarked(revision: Revision): Promise<boolean>;
  upgrade(set: MigrationSet, target?: Revision): Promise<UpgradeResult>;
  downgrade(set: MigrationSet, target: Revision): Promise<UpgradeResult>;
  columnExists(table: string, column: string): Promise<boolean>;
}

export class MigrationApplyError extends Error {
  override readonly name = 'MigrationApplyError';

  constructor(
    readonly revision: string,
    readonly direction: 'up' | 'down',
    cause: unknown,
  ) {
    super(`Migration ${revision} (${direction}) failed: ${errorMessage(cause)}`, { cause });
  }
}

export const DEFAULT_VERSION_TABLE = 'schema_version';

export type PgMigrationStoreOptions = {
  lockKey: number;
  table?: string;
  /** How long to keep polling for a lock held by another instance. Default 10 minutes. */
  lockWaitMs?: number;
  log?: StartupLog;
  sleep?: Sleep;
};

export class PgMigrationStore implements MigrationStore {
  private readonly table: string;
  private readonly lockWaitMs: number;
  private readonly log: StartupLog;
  private readonly sleep: Sleep;

  constructor(
    private readonly pool: ConnectionSource,
    private readonly opts: PgMigrationStoreOptions,
  ) {
    this.table = opts.table ?? DEFAULT_VERSION_TABLE;
    this.lockWaitMs = opts.lockWaitMs ?? 600_000;
    this.log = opts.log ?? createStartupLog();
    this.sleep = opts.sleep ?? sleep;
    if (!/^[a-z_][a-z0-9_]*$/.test(this.table)) {
      throw new Error(`Invalid version table name: ${this.table}`);
    }
  }

  async ping(): Promise<ServerInfo> {
    const r = await this.pool.query(
      `SELECT current_database() AS database, current_setting('server_version') AS server_version`,
    );
    const database = stringField(r.rows[0], 'database');
    const serverVersion = stringField(r.rows[0], 'server_version');
    if (database === undefined || serverVersion === undefined) {
      throw new Error('Unexpected reply to preflight query');
    }
    return { database, serverVersion };
  }

  async markerExists(): Promise<boolean> {
    return this.tableExists(this.pool);
  }

  async currentRevision(): Promise<Revision> {
    if (!(await this.tableExists(this.pool))) return null;
    return this.readRevision(this.pool);
  }

  async stamp(revision: Revision): Promise<void> {
    await this.withLock(async (client) => {
      await this.ensureVersionTable(client);
      await this.transaction(client, () => this.writeRevision(client, revision));
    });
  }

  async stampIfUnmarked(revision: Revision): Promise<boolean> {
    return this.withLock(async (client) => {
      if (await this.tableExists(client)) return false;
      await this.ensureVersionTable(client);
      await this.transaction(client, () => this.writeRevision(client, revision));
      return true;
    });
  }

  async upgrade(set: MigrationSet, target: Revision = set.head): Promise<UpgradeResult> {
    return this.withLock(async (client) => {
      await this.ensureVersionTable(client);
      const from = await this.readRevision(client);
      const units = set.upgradePath(from, target);
      return this.applyAll(client, from, units, 'up', (u) => u.revision);
    });
  }

  async downgrade(set: MigrationSet, target: Revision): Promise<UpgradeResult> {
    return this.withLock(async (client) => {
      await this.ensureVersionTable(client);
      const from = await this.readRevision(client);
      const units = set.downgradePath(from, target);
      return this.applyAll(client, from, units, 'down', (u) => u.downRevision);
    });
  }

  async columnExists(table: string, column: string): Promise<boolean> {
    const r = await this.pool.query(
      `SELECT 1 FROM information_schema.columns
       WHERE table_schema = current_schema() AND table_name = $1 AND column_name = $2
       LIMIT 1`,
      [table, column],
    );
    return r.rows.length > 0;
  }

  // All units run in one transaction; the marker moves after each unit so a rolled-back
  // run leaves it where it started.
  private async applyAll(
    client: Queryable,
    from: Revision,
    units: MigrationUnit[],
    direction: 'up' | 'down',
    revisionAfter: (u: MigrationUnit) => Revision,
  ): Promise<UpgradeResult> {
    if (units.length === 0) return { from, to: from, applied: [] };

    let to = from;
    await this.transaction(client, async () => {
      for (const u of units) {
        const sql = direction === 'up' ? u.up : u.down;
        if (sql === undefined) {
          throw new MigrationApplyError(u.revision, direction, new Error('no downgrade script'));
        }
        try {
          await client.query(sql);
        } catch (e) {
          throw new MigrationApplyError(u.revision, direction, e);
        }
        to = revisionAfter(u);
        await this.writeRevision(client, to);
      }
    });
    return { from, to, applied: units.map((u) => u.revision) };
  }

  // A failed ROLLBACK is logged; the original error is the one rethrown.
  private async transaction<T>(client: Queryable, fn: () => Promise<T>): Promise<T> {
    await client.query('BEGIN');
    try {
      const out = await fn();
      await client.query('COMMIT');
      return out;
    } catch (e) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackErr) {
        this.log.warn(`Rollback failed: ${errorMessage(rollbackErr)}`);
      }
      throw e;
    }
  }

  // Session-level lock on one dedicated connection. A client that saw any error is handed
  // back to the pool with it, so the pool discards the connection (and any lock it still holds).
  private async withLock<T>(fn: (client: Queryable) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    let failure: Error | undefined;
    let locked = false;
    try {
      await this.acquireLock(client);
      locked = true;
      return await fn(client);
    } catch (e) {
      failure = e instanceof Error ? e : new Error(errorMessage(e));
      throw e;
    } finally {
      if (locked) {
        try {
          await client.query('SELECT pg_advisory_unlock($1)', [this.opts.lockKey]);
        } catch (unlockErr) {
          this.log.warn(`Advisory unlock failed: ${errorMessage(unlockErr)}`);
          failure ??= unlockErr instanceof Error ? unlockErr : new Error(errorMessage(unlockErr));
        }
      }
      client.release(failure);
    }
  }

  // Polls with try-lock so the wait is bounded by lockWaitMs rather than statement_timeout.
  private async acquireLock(client: Queryable) {
    const { lockKey } = this.opts;
    let waited = 0;
    for (let attempt = 1; ; attempt++) {
      const r = await client.query('SELECT pg_try_advisory_lock($1) AS locked', [lockKey]);
      if (r.rows[0]?.locked === true) return;
      if (waited >= this.lockWaitMs) {
        throw new Error(`Timed out after ${waited}ms waiting for migration lock ${lockKey}`);
      }
      if (attempt === 1) this.log.info(`Migration lock ${lockKey} is held by another instance; waiting...`);
      const delay = Math.min(backoffMs({ baseMs: 250, maxMs: 5_000, attempt }), this.lockWaitMs - waited);
      await this.sleep(delay);
      waited += delay;
    }
  }

  private async tableExists(db: Queryable): Promise<boolean> {
    const r = await db.query(
      `SELECT 1 FROM information_schema.tables
       WHERE table_schema = current_schema() AND table_name = $1
       LIMIT 1`,
      [this.table],
    );
    return r.rows.length > 0;
  }

  private async ensureVersionTable(db: Queryable) {
    await db.query(`CREATE TABLE IF NOT EXISTS ${this.table} (version_num TEXT NOT NULL PRIMARY KEY)`);
  }

  private async readRevision(db: Queryable): Promise<Revision> {
    const r = await db.query(`SELECT version_num FROM ${this.table}`);
    if (r.rows.length > 1) {
      throw new Error(`${this.table} holds ${r.rows.length} rows; expected at most one`);
    }
    return stringField(r.rows[0], 'version_num') ?? null;
  }

  private async writeRevision(db: Queryable, revision: Revision) {
    await db.query(`DELETE FROM ${this.table}`);
    if (revision !== null) {
      await db.query(`INSERT INTO ${this.table} (version_num) VALUES ($1)`, [revision]);
    }
  }
}
