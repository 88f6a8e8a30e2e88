import { createUsers } from './0001_create_users.js';
import { createPets } from './0002_create_pets.js';
import { usersSoftDelete } from './0003_users_soft_delete.js';

export type MigrationUnit = {
  revision: string;
  /** null for the first unit */
  downRevision: string | null;
  description: string;
  up: string;
  down?: string;
};

/** `base` is the state before the first unit; represented as null. */
export type Revision = string | null;

export class MigrationSetError extends Error {
  override readonly name = 'MigrationSetError';
}

/**
 * Ordered, validated migration history. The chain must be linear: one root, every
 * predecessor known, no revision with two successors.
 */
export class MigrationSet {
  readonly units: readonly MigrationUnit[];

  constructor(units: readonly MigrationUnit[]) {
    const byRevision = new Map<string, MigrationUnit>();
    for (const u of units) {
      if (byRevision.has(u.revision)) {
        throw new MigrationSetError(`Duplicate revision: ${u.revision}`);
      }
      byRevision.set(u.revision, u);
    }

    const successor = new Map<Revision, MigrationUnit>();
    for (const u of units) {
      if (u.downRevision !== null && !byRevision.has(u.downRevision)) {
        throw new MigrationSetError(`Revision ${u.revision} points to unknown predecessor ${u.downRevision}`);
      }
      const taken = successor.get(u.downRevision);
      if (taken) {
        const parent = u.downRevision ?? 'base';
        throw new MigrationSetError(`Branched history: ${taken.revision} and ${u.revision} both follow ${parent}`);
      }
      successor.set(u.downRevision, u);
    }

    const ordered: MigrationUnit[] = [];
    let next = successor.get(null);
    while (next) {
      ordered.push(next);
      next = successor.get(next.revision);
    }
    // anything not reachable from base sits on a cycle
    if (ordered.length !== units.length) {
      throw new MigrationSetError('Migration history contains a cycle');
    }
    this.units = ordered;
  }

  get head(): Revision {
    return this.units.at(-1)?.revision ?? null;
  }

  has(revision: string): boolean {
    return this.units.some((u) => u.revision === revision);
  }

  /** Accepts a revision id, `head` or `base`. */
  resolve(target: string): Revision {
    if (target === 'head') return this.head;
    if (target === 'base') return null;
    if (!this.has(target)) throw new MigrationSetError(`Unknown revision: ${target}`);
    return target;
  }

  private position(revision: Revision): number {
    if (revision === null) return 0;
    const i = this.units.findIndex((u) => u.revision === revision);
    if (i < 0) throw new MigrationSetError(`Unknown revision: ${revision}`);
    return i + 1;
  }

  /** Units to apply, ascending, to move from `from` to `to`. Empty when already there. */
  upgradePath(from: Revision, to: Revision = this.head): MigrationUnit[] {
    const start = this.position(from);
    const end = this.position(to);
    if (end < start) {
      throw new MigrationSetError(`Cannot upgrade from ${from ?? 'base'} to older revision ${to ?? 'base'}`);
    }
    return this.units.slice(start, end);
  }

  /** Units to revert, newest first, to move from `from` down to `to`. */
  downgradePath(from: Revision, to: Revision): MigrationUnit[] {
    const start = this.position(from);
    const end = this.position(to);
    if (end > start) {
      throw new MigrationSetError(`Cannot downgrade from ${from ?? 'base'} to newer revision ${to ?? 'base'}`);
    }
    return this.units.slice(end, start).reverse();
  }

  /** Newest first: `<down> -> <rev>[ (head)][ (current)], <description>`. */
  history(current?: Revision): string[] {
    const head = this.head;
    return [...this.units].reverse().map((u) => {
      let line = `${u.downRevision ?? '<base>'} -> ${u.revision}`;
      if (u.revision === head) line += ' (head)';
      if (current !== undefined && u.revision === current) line += ' (current)';
      return `${line}, ${u.description}`;
    });
  }
}

export function describeRevision(set: MigrationSet, revision: Revision): string {
  if (revision === null) return '<base>';
  return revision === set.head ? `${revision} (head)` : revision;
}

export const migrations = new MigrationSet([createUsers, createPets, usersSoftDelete]);
