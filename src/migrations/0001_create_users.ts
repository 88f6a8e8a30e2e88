import type { MigrationUnit } from './index.js';

export const createUsers: MigrationUnit = {
  revision: '0001',
  downRevision: null,
  description: 'create users',
  up: `
CREATE TABLE IF NOT EXISTS users (
  id SERIAL PRIMARY KEY,
  email TEXT UNIQUE NOT NULL,
  name TEXT,
  hashed_password TEXT NOT NULL,
  role TEXT NOT NULL DEFAULT 'USER', -- USER|ADMIN
  is_enabled BOOLEAN NOT NULL DEFAULT true,
  is_verified BOOLEAN NOT NULL DEFAULT false,
  verification_code TEXT,
  verification_code_expires_at TIMESTAMPTZ,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  last_login_at TIMESTAMPTZ
);
`,
  down: `DROP TABLE IF EXISTS users;`,
};
