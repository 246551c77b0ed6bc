import type { Pool } from "pg";

// name_key holds lower(name); its UNIQUE constraint is the case-insensitive key.
export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS countries (
    id SERIAL PRIMARY KEY,
    name TEXT NOT NULL,
    name_key TEXT NOT NULL UNIQUE,
    capital TEXT,
    region TEXT,
    population BIGINT NOT NULL CHECK (population > 0),
    currency_code TEXT,
    exchange_rate DOUBLE PRECISION CHECK (exchange_rate >= 0),
    estimated_gdp DOUBLE PRECISION CHECK (estimated_gdp >= 0),
    flag_url TEXT,
    last_refreshed_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );

  CREATE INDEX IF NOT EXISTS countries_region_idx ON countries (region);
  CREATE INDEX IF NOT EXISTS countries_currency_code_idx ON countries (currency_code);

  CREATE TABLE IF NOT EXISTS app_status (
    id INT PRIMARY KEY DEFAULT 1 CHECK (id = 1),
    last_refreshed_at TIMESTAMPTZ
  );

  INSERT INTO app_status (id, last_refreshed_at) VALUES (1, NULL)
  ON CONFLICT (id) DO NOTHING;
`;

export const initializeDB = async (pool: Pick<Pool, "query">) => {
  await pool.query(SCHEMA_SQL);
};
