import { Bootstrapper, type BootstrapResult, type Launcher } from './bootstrap.js';
import { loadConfig, type BootstrapConfig } from './config.js';
import { createPool } from './db.js';
import { BootstrapError, errorMessage } from './errors.js';
import { createLauncher } from './launcher.js';
import { createStartupLog, type StartupLog } from './log.js';
import { PgMigrationStore, type MigrationStore } from './migrate.js';
import { migrations } from './migrations/index.js';

type SignalSource = {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
};

export type StartDeps = {
  store: MigrationStore;
  launch: Launcher;
  /** Closes the bootstrapper's own connections. */
  close(): Promise<void>;
  signals?: SignalSource;
};

const FORWARDED_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

export function connect(config: BootstrapConfig, log: StartupLog): StartDeps {
  const pool = createPool({
    connectionString: config.databaseUrl,
    connectTimeoutMs: config.connectTimeoutMs,
    statementTimeoutMs: config.statementTimeoutMs,
  });
  pool.on('error', (err) => log.warn(`Idle database connection error: ${err.message}`));
  return {
    store: new PgMigrationStore(pool, { lockKey: config.lockKey, lockWaitMs: config.lockWaitMs, log }),
    launch: createLauncher({ command: config.serviceCommand }),
    close: () => pool.end(),
  };
}

/**
 * Container entry point: migrate, verify, then run the service until it exits.
 * Resolves with the process exit code.
 */
export async function start(
  config: BootstrapConfig,
  log: StartupLog = createStartupLog(),
  deps: StartDeps = connect(config, log),
): Promise<number> {
  let closed = false;
  const close = async () => {
    if (closed) return;
    closed = true;
    await deps.close();
  };

  const bootstrapper = new Bootstrapper({
    store: deps.store,
    migrations,
    baseline: config.baseline,
    preflight: config.preflight,
    verifySchema: config.verifySchema,
    requiredColumns: config.requiredColumns,
    retry: config.retry,
    bind: config.bind,
    workers: config.workers,
    // the service opens its own connections; ours are closed before it starts
    launch: async (req) => {
      await close();
      return deps.launch(req);
    },
    log,
  });

  let result: BootstrapResult;
  try {
    result = await bootstrapper.run();
  } catch (e) {
    await close();
    throw e;
  }

  const { handle } = result;
  const signals: SignalSource = deps.signals ?? process;
  const forwards = FORWARDED_SIGNALS.map((sig) => {
    const forward = () => handle.kill(sig);
    signals.on(sig, forward);
    return { sig, forward };
  });
  try {
    const code = await handle.exited;
    log.info(`Service exited with code ${code}`);
    return code;
  } finally {
    for (const { sig, forward } of forwards) signals.off(sig, forward);
  }
}

/** Loads config, runs startup and maps any fatal error to one final `(e)` line and exit code 1. */
export async function main(
  env: Record<string, string | undefined> = process.env,
  log: StartupLog = createStartupLog(),
  makeDeps: (config: BootstrapConfig, log: StartupLog) => StartDeps = connect,
): Promise<number> {
  try {
    const config = loadConfig(env);
    return await start(config, log, makeDeps(config, log));
  } catch (e) {
    if (e instanceof BootstrapError) {
      log.error(`${e.message}\n[${e.kind} error during ${e.state}]`);
    } else {
      log.error(`Startup failed: ${errorMessage(e)}`);
    }
    return 1;
  }
}

if (process.argv[1] && /start(\.[cm]?[jt]s)?$/i.test(process.argv[1])) {
  process.exitCode = await main();
}
