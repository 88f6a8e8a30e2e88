/**
 * Test doubles for the migration store and service launcher.
 *
 * InMemoryMigrationStore models a database as a set of `table.column` names plus an
 * optional marker. A unit's `up`/`down` text is read as whitespace-separated tokens:
 * `table.column` adds (or, for down, drops) that column; `FAIL:<message>` throws, with
 * underscores in the message read as spaces.
 * Upgrades are all-or-nothing like the Postgres store's single transaction.
 */

import type { Launcher, LaunchRequest, ServiceHandle } from './bootstrap.js';
import type { MigrationSet, MigrationUnit, Revision } from './migrations/index.js';
import { MigrationApplyError, type MigrationStore, type ServerInfo, type UpgradeResult } from './migrate.js';

type Method =
  | 'ping'
  | 'markerExists'
  | 'currentRevision'
  | 'stamp'
  | 'stampIfUnmarked'
  | 'upgrade'
  | 'downgrade'
  | 'columnExists';

export class InMemoryMigrationStore implements MigrationStore {
  /** undefined: marker table absent */
  revision: Revision | undefined;
  readonly columns: Set<string>;
  /** `up:<rev>` / `down:<rev>` for every body that ran and was kept */
  readonly executed: string[] = [];
  readonly calls: Method[] = [];
  private readonly failures = new Map<Method, unknown[]>();

  constructor(init: { revision?: Revision; columns?: string[] } = {}) {
    this.revision = init.revision;
    this.columns = new Set(init.columns ?? []);
  }

  /** Queue errors thrown by the next calls of `method`. */
  failNext(method: Method, ...errors: unknown[]): this {
    this.failures.set(method, [...(this.failures.get(method) ?? []), ...errors]);
    return this;
  }

  private enter(method: Method) {
    this.calls.push(method);
    const queued = this.failures.get(method);
    if (queued && queued.length > 0) throw queued.shift();
  }

  async ping(): Promise<ServerInfo> {
    this.enter('ping');
    return { database: 'petcare', serverVersion: '16.3' };
  }

  async markerExists(): Promise<boolean> {
    this.enter('markerExists');
    return this.revision !== undefined;
  }

  async currentRevision(): Promise<Revision> {
    this.enter('currentRevision');
    return this.revision ?? null;
  }

  async stamp(revision: Revision): Promise<void> {
    this.enter('stamp');
    this.revision = revision;
  }

  async stampIfUnmarked(revision: Revision): Promise<boolean> {
    this.enter('stampIfUnmarked');
    if (this.revision !== undefined) return false;
    this.revision = revision;
    return true;
  }

  async upgrade(set: MigrationSet, target: Revision = set.head): Promise<UpgradeResult> {
    this.enter('upgrade');
    const from = this.revision ?? null;
    return this.applyAll(from, set.upgradePath(from, target), 'up');
  }

  async downgrade(set: MigrationSet, target: Revision): Promise<UpgradeResult> {
    this.enter('downgrade');
    const from = this.revision ?? null;
    return this.applyAll(from, set.downgradePath(from, target), 'down');
  }

  async columnExists(table: string, column: string): Promise<boolean> {
    this.enter('columnExists');
    return this.columns.has(`${table}.${column}`);
  }

  private applyAll(from: Revision, units: MigrationUnit[], direction: 'up' | 'down'): UpgradeResult {
    const snapshot = new Set(this.columns);
    const executedBefore = this.executed.length;
    let to = from;
    try {
      for (const u of units) {
        const body = direction === 'up' ? u.up : u.down;
        if (body === undefined) throw new MigrationApplyError(u.revision, direction, new Error('no downgrade script'));
        for (const token of body.split(/\s+/).filter(Boolean)) {
          if (token.startsWith('FAIL:')) {
            throw new MigrationApplyError(u.revision, direction, new Error(token.slice('FAIL:'.length).replace(/_/g, ' ')));
          }
          if (direction === 'up') this.columns.add(token);
          else this.columns.delete(token);
        }
        this.executed.push(`${direction}:${u.revision}`);
        to = direction === 'up' ? u.revision : u.downRevision;
      }
    } catch (e) {
      this.columns.clear();
      for (const c of snapshot) this.columns.add(c);
      this.executed.length = executedBefore;
      throw e;
    }
    this.revision = to;
    return { from, to, applied: units.map((u) => u.revision) };
  }
}

export type FakeLauncher = Launcher & {
  requests: LaunchRequest[];
  killed: NodeJS.Signals[];
};

export function createFakeLauncher(opts: { exitCode?: number; pid?: number; error?: Error } = {}): FakeLauncher {
  const requests: LaunchRequest[] = [];
  const killed: NodeJS.Signals[] = [];
  const launch = async (req: LaunchRequest): Promise<ServiceHandle> => {
    requests.push(req);
    if (opts.error) throw opts.error;
    return {
      pid: opts.pid ?? 4242,
      exited: Promise.resolve(opts.exitCode ?? 0),
      kill: (signal) => {
        killed.push(signal);
      },
    };
  };
  return Object.assign(launch, { requests, killed });
}
