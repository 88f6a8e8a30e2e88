import type { MigrationUnit } from './index.js';

export const createPets: MigrationUnit = {
  revision: '0002',
  downRevision: '0001',
  description: 'create species and pet',
  up: `
CREATE TABLE IF NOT EXISTS species (
  id SERIAL PRIMARY KEY,
  code TEXT UNIQUE NOT NULL,
  name TEXT NOT NULL,
  category TEXT
);

CREATE TABLE IF NOT EXISTS pet (
  id SERIAL PRIMARY KEY,
  name TEXT,
  sex TEXT NOT NULL DEFAULT 'Not Specified', -- Male|Female|Not Specified
  specie_id INT REFERENCES species(id),
  breed TEXT,
  birth_date TIMESTAMPTZ,
  profile_image_url TEXT,
  owner_id INT NOT NULL REFERENCES users(id),
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE INDEX IF NOT EXISTS idx_pet_owner_id ON pet (owner_id);
`,
  down: `
DROP TABLE IF EXISTS pet;
DROP TABLE IF EXISTS species;
`,
};
