import { describe, expect, it } from 'vitest';
import { MigrationSet, describeRevision, migrations, type MigrationUnit } from './index.js';

const unit = (revision: string, downRevision: string | null): MigrationUnit => ({
  revision,
  downRevision,
  description: `unit ${revision}`,
  up: '',
});

describe('MigrationSet', () => {
  it('orders units from base to head regardless of input order', () => {
    const set = new MigrationSet([unit('c', 'b'), unit('a', null), unit('b', 'a')]);
    expect(set.units.map((u) => u.revision)).toEqual(['a', 'b', 'c']);
    expect(set.head).toBe('c');
  });

  it('has no head when empty', () => {
    const set = new MigrationSet([]);
    expect(set.head).toBeNull();
    expect(set.upgradePath(null)).toEqual([]);
    expect(set.history()).toEqual([]);
  });

  it('rejects duplicate revisions', () => {
    expect(() => new MigrationSet([unit('a', null), unit('a', null)])).toThrow('Duplicate revision: a');
  });

  it('rejects an unknown predecessor', () => {
    expect(() => new MigrationSet([unit('a', null), unit('b', 'x')])).toThrow(
      'Revision b points to unknown predecessor x',
    );
  });

  it('rejects branched history', () => {
    expect(() => new MigrationSet([unit('a', null), unit('b', 'a'), unit('c', 'a')])).toThrow(
      'Branched history: b and c both follow a',
    );
  });

  it('rejects a cycle detached from base', () => {
    expect(() => new MigrationSet([unit('a', null), unit('b', 'c'), unit('c', 'b')])).toThrow(
      'Migration history contains a cycle',
    );
  });

  describe('paths', () => {
    const set = new MigrationSet([unit('a', null), unit('b', 'a'), unit('c', 'b')]);

    it('upgrades from base through head', () => {
      expect(set.upgradePath(null).map((u) => u.revision)).toEqual(['a', 'b', 'c']);
    });

    it('upgrades from the middle to an explicit target', () => {
      expect(set.upgradePath('a', 'b').map((u) => u.revision)).toEqual(['b']);
    });

    it('is empty at head', () => {
      expect(set.upgradePath('c')).toEqual([]);
    });

    it('refuses to upgrade backwards', () => {
      expect(() => set.upgradePath('c', 'a')).toThrow('Cannot upgrade from c to older revision a');
    });

    it('downgrades newest first', () => {
      expect(set.downgradePath('c', 'a').map((u) => u.revision)).toEqual(['c', 'b']);
      expect(set.downgradePath('b', null).map((u) => u.revision)).toEqual(['b', 'a']);
    });

    it('refuses to downgrade forwards', () => {
      expect(() => set.downgradePath('a', 'c')).toThrow('Cannot downgrade from a to newer revision c');
    });

    it('resolves head, base and known revisions', () => {
      expect(set.resolve('head')).toBe('c');
      expect(set.resolve('base')).toBeNull();
      expect(set.resolve('b')).toBe('b');
      expect(() => set.resolve('nope')).toThrow('Unknown revision: nope');
    });

    it('renders history newest first with head and current markers', () => {
      expect(set.history('b')).toEqual([
        'b -> c (head), unit c',
        'a -> b (current), unit b',
        '<base> -> a, unit a',
      ]);
    });

    it('describes revisions', () => {
      expect(describeRevision(set, 'c')).toBe('c (head)');
      expect(describeRevision(set, 'a')).toBe('a');
      expect(describeRevision(set, null)).toBe('<base>');
    });
  });
});

describe('bundled migrations', () => {
  it('form a linear chain ending in the soft-delete column', () => {
    expect(migrations.units.map((u) => u.revision)).toEqual(['0001', '0002', '0003']);
    expect(migrations.head).toBe('0003');
  });

  it('ship a downgrade for every unit', () => {
    expect(migrations.units.filter((u) => !u.down)).toEqual([]);
  });
});
