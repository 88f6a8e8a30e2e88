import type { BaselinePolicy, ColumnRef, RetryOptions } from './config.js';
import type { StartupLog } from './log.js';
import type { MigrationStore } from './migrate.js';
import type { MigrationSet, Revision } from './migrations/index.js';
import type { Sleep } from './retry.js';
import { BootstrapError, type BootstrapState, errorMessage } from './errors.js';
import { describeRevision } from './migrations/index.js';
import { withRetry } from './retry.js';

export type ServiceHandle = {
  pid?: number;
  /** Resolves with the service's exit code. */
  exited: Promise<number>;
  kill(signal: NodeJS.Signals): void;
};

export type LaunchRequest = { bind: string; workers: number };

export type Launcher = (req: LaunchRequest) => Promise<ServiceHandle>;

export type BootstrapperOptions = {
  store: MigrationStore;
  migrations: MigrationSet;
  baseline: BaselinePolicy;
  preflight: boolean;
  verifySchema: boolean;
  requiredColumns: ColumnRef[];
  retry: RetryOptions;
  bind: string;
  workers: number;
  launch: Launcher;
  log: StartupLog;
  sleep?: Sleep;
};

export type BootstrapResult = {
  revision: Revision;
  baselined: boolean;
  applied: string[];
  handle: ServiceHandle;
};

/**
 * Brings the database to head, checks the schema contract, then starts the service.
 * Any fatal step rejects with BootstrapError and the launcher is never called.
 */
export class Bootstrapper {
  private current: BootstrapState = 'CHECKING_TOOLING';

  constructor(private readonly opts: BootstrapperOptions) {}

  get state(): BootstrapState {
    return this.current;
  }

  async run(): Promise<BootstrapResult> {
    const { log } = this.opts;

    if (this.opts.preflight) await this.preflight();

    const baselined = await this.detect();
    const { to, applied } = await this.upgrade();

    if (this.opts.verifySchema) await this.verify();

    await this.report();

    this.enter('STARTING_SERVICE', `Starting service on ${this.opts.bind} with ${this.opts.workers} worker(s)...`);
    let handle: ServiceHandle;
    try {
      handle = await this.opts.launch({ bind: this.opts.bind, workers: this.opts.workers });
    } catch (e) {
      throw this.fail('launch', `Service failed to start: ${errorMessage(e)}`, e);
    }
    if (handle.pid !== undefined) log.info(`Service started (pid ${handle.pid})`);

    return { revision: to, baselined, applied, handle };
  }

  private enter(state: BootstrapState, msg: string) {
    this.current = state;
    this.opts.log.info(msg);
  }

  private fail(kind: BootstrapError['kind'], message: string, cause?: unknown): BootstrapError {
    return new BootstrapError(kind, this.current, message, { cause });
  }

  private db<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(label, fn, { ...this.opts.retry, log: this.opts.log, sleep: this.opts.sleep });
  }

  private async preflight() {
    this.enter('CHECKING_TOOLING', 'Checking database connectivity...');
    try {
      const info = await this.db('Connectivity check', () => this.opts.store.ping());
      this.opts.log.info(`Connected to ${info.database} (PostgreSQL ${info.serverVersion})`);
    } catch (e) {
      throw this.fail('connectivity', `Database unreachable: ${errorMessage(e)}`, e);
    }
  }

  /** Returns true when the database had no marker and was baselined. */
  private async detect(): Promise<boolean> {
    const { store, migrations, log } = this.opts;

    this.enter('DETECTING', 'Checking if migrations are in sync...');
    let exists: boolean;
    try {
      exists = await this.db('Migration marker lookup', () => store.markerExists());
    } catch (e) {
      throw this.fail('connectivity', `Could not read migration state: ${errorMessage(e)}`, e);
    }
    if (exists) return false;

    switch (this.opts.baseline) {
      case 'fail':
        throw this.fail(
          'unmigrated',
          'No migration marker found.\nThis database has never been migrated.\nPlease run migrations manually before starting the app.',
        );
      case 'stamp': {
        const head = migrations.head;
        this.enter('BASELINING', `No migration marker found; stamping database at ${describeRevision(migrations, head)} without running migrations`);
        log.warn('Stamping assumes the existing schema already matches head');
        let stamped: boolean;
        try {
          stamped = await this.db('Baseline stamp', () => store.stampIfUnmarked(head));
        } catch (e) {
          throw this.fail('migration', `Baseline stamp failed: ${errorMessage(e)}`, e);
        }
        if (!stamped) log.info('Migration marker appeared while waiting for the lock; leaving it as written');
        return stamped;
      }
      case 'upgrade':
        // upgrade() creates the marker table and reads base under the lock
        this.enter('BASELINING', 'No migration marker found; starting from base and applying full history');
        return true;
    }
  }

  private async upgrade() {
    const { store, migrations, log } = this.opts;

    this.enter('UPGRADING', 'Running migrations...');
    try {
      const result = await this.db('Migration upgrade', () => store.upgrade(migrations));
      if (result.applied.length === 0) {
        log.info(`Already at ${describeRevision(migrations, result.to)}; nothing to apply`);
      } else {
        log.info(`Applied ${result.applied.join(', ')}; now at ${describeRevision(migrations, result.to)}`);
      }
      return result;
    } catch (e) {
      throw this.fail('migration', `Migration upgrade failed: ${errorMessage(e)}`, e);
    }
  }

  private async verify() {
    const { store, requiredColumns } = this.opts;

    this.enter('VERIFYING', `Verifying ${requiredColumns.length} required column(s)...`);
    for (const { table, column } of requiredColumns) {
      let exists: boolean;
      try {
        exists = await this.db(`Column check ${table}.${column}`, () => store.columnExists(table, column));
      } catch (e) {
        throw this.fail('schema', `Schema verification failed: could not check ${table}.${column}: ${errorMessage(e)}`, e);
      }
      if (!exists) {
        throw this.fail('schema', `Schema verification failed: '${column}' column missing from '${table}' table.`);
      }
    }
  }

  private async report() {
    const { store, migrations, log } = this.opts;

    this.enter('REPORTING', 'Showing migration history...');
    try {
      const current = await store.currentRevision();
      const lines = migrations.history(current);
      log.info(lines.length ? lines.join('\n') : '<no migrations>');
      log.info(`Current revision: ${describeRevision(migrations, current)}`);
    } catch (e) {
      log.warn(`Could not report migration state: ${errorMessage(e)}`);
    }
  }
}
