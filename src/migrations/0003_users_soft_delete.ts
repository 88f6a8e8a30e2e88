import type { MigrationUnit } from './index.js';

export const usersSoftDelete: MigrationUnit = {
  revision: '0003',
  downRevision: '0002',
  description: 'add users.is_deleted',
  up: `ALTER TABLE users ADD COLUMN IF NOT EXISTS is_deleted BOOLEAN NOT NULL DEFAULT false;`,
  down: `ALTER TABLE users DROP COLUMN IF EXISTS is_deleted;`,
};
