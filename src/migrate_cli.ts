#!/usr/bin/env node
import { loadConfig } from './config.js';
import { createPool } from './db.js';
import { errorMessage } from './errors.js';
import { createStartupLog, type StartupLog } from './log.js';
import { PgMigrationStore, type MigrationStore } from './migrate.js';
import { describeRevision, migrations, type MigrationSet } from './migrations/index.js';

const USAGE = `usage: petcare-migrate <command> [revision]

commands:
  upgrade [target]     apply migrations up to target (default: head)
  downgrade <target>   revert migrations down to target (a revision or base)
  stamp <revision>     set the marker without running migrations (revision, head or base)
  current              show the applied revision
  history              list all revisions, newest first`;

export async function runCommand(
  argv: string[],
  store: MigrationStore,
  set: MigrationSet,
  log: StartupLog,
): Promise<number> {
  const [command, target] = argv;

  switch (command) {
    case 'upgrade': {
      const r = await store.upgrade(set, set.resolve(target ?? 'head'));
      log.info(r.applied.length ? `Applied ${r.applied.join(', ')}` : 'Nothing to apply');
      log.info(`Now at ${describeRevision(set, r.to)}`);
      return 0;
    }
    case 'downgrade': {
      if (!target) break;
      const r = await store.downgrade(set, set.resolve(target));
      log.info(r.applied.length ? `Reverted ${r.applied.join(', ')}` : 'Nothing to revert');
      log.info(`Now at ${describeRevision(set, r.to)}`);
      return 0;
    }
    case 'stamp': {
      if (!target) break;
      const revision = set.resolve(target);
      await store.stamp(revision);
      log.info(`Stamped ${describeRevision(set, revision)}`);
      return 0;
    }
    case 'current': {
      if (!(await store.markerExists())) {
        log.warn('No migration marker found; this database has never been migrated');
        return 0;
      }
      log.info(`Current revision: ${describeRevision(set, await store.currentRevision())}`);
      return 0;
    }
    case 'history': {
      const current = (await store.markerExists()) ? await store.currentRevision() : undefined;
      log.info(set.history(current).join('\n') || '<no migrations>');
      return 0;
    }
  }

  log.error(USAGE);
  return 2;
}

async function main() {
  const log = createStartupLog();
  const config = loadConfig();
  const pool = createPool({
    connectionString: config.databaseUrl,
    connectTimeoutMs: config.connectTimeoutMs,
    statementTimeoutMs: config.statementTimeoutMs,
  });
  try {
    const store = new PgMigrationStore(pool, { lockKey: config.lockKey, lockWaitMs: config.lockWaitMs, log });
    process.exitCode = await runCommand(process.argv.slice(2), store, migrations, log);
  } finally {
    await pool.end();
  }
}

if (process.argv[1] && /migrate_cli(\.[cm]?[jt]s)?$/i.test(process.argv[1])) {
  main().catch((e: unknown) => {
    createStartupLog().error(`migrate failed: ${errorMessage(e)}`);
    process.exitCode = 1;
  });
}
