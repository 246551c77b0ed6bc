import type { Pool, QueryResult, QueryResultRow } from "pg";
import type {
  Country,
  CountryFilters,
  CountryRepository,
  SortKey,
  StatusSummary,
  UpsertResult,
} from "../models/country";
import type { MergedCountry } from "../utils/mergeCountryData";
import logger from "../utils/logger";

export interface SqlClient {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlClient & { release(): void }>;
}

export function fromPgPool(pool: Pool): SqlPool {
  return {
    query: (text, values) => pool.query(text, values),
    connect: async () => {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: () => client.release(),
      };
    },
  };
}

interface CountryRow {
  id: number;
  name: string;
  capital: string | null;
  region: string | null;
  population: string | number;
  currency_code: string | null;
  exchange_rate: number | null;
  estimated_gdp: number | null;
  flag_url: string | null;
  last_refreshed_at: Date | string;
}

const COLUMNS =
  "id, name, capital, region, population, currency_code, exchange_rate, estimated_gdp, flag_url, last_refreshed_at";

const ORDER_BY: Record<SortKey, string> = {
  gdp_desc: "estimated_gdp DESC NULLS LAST, id",
  gdp_asc: "estimated_gdp ASC NULLS LAST, id",
  name_asc: "name ASC, id",
  name_desc: "name DESC, id",
  population_desc: "population DESC, id",
  population_asc: "population ASC, id",
};

export const UPSERT_SQL = `
  INSERT INTO countries
    (name, name_key, capital, region, population, currency_code, exchange_rate, estimated_gdp, flag_url, last_refreshed_at)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
  ON CONFLICT (name_key)
  DO UPDATE SET
    capital = EXCLUDED.capital,
    region = EXCLUDED.region,
    population = EXCLUDED.population,
    currency_code = EXCLUDED.currency_code,
    exchange_rate = EXCLUDED.exchange_rate,
    estimated_gdp = EXCLUDED.estimated_gdp,
    flag_url = EXCLUDED.flag_url,
    last_refreshed_at = EXCLUDED.last_refreshed_at
  RETURNING (xmax = 0) AS inserted;
`;

export const normalizeName = (name: string) => name.toLowerCase();

function toIso(value: Date | string) {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

function toCountry(row: CountryRow): Country {
  return {
    id: row.id,
    name: row.name,
    capital: row.capital,
    region: row.region,
    population: Number(row.population),
    currency_code: row.currency_code,
    exchange_rate: row.exchange_rate === null ? null : Number(row.exchange_rate),
    estimated_gdp: row.estimated_gdp === null ? null : Number(row.estimated_gdp),
    flag_url: row.flag_url,
    last_refreshed_at: toIso(row.last_refreshed_at),
  };
}

export function buildListQuery(filters: CountryFilters = {}) {
  const values: string[] = [];
  const where: string[] = [];

  if (filters.region !== undefined) {
    values.push(filters.region);
    where.push(`region = $${values.length}`);
  }

  if (filters.currency !== undefined) {
    values.push(filters.currency);
    where.push(`currency_code = $${values.length}`);
  }

  const order = filters.sort ? ORDER_BY[filters.sort] : "id";
  const parts = [`SELECT ${COLUMNS} FROM countries`];
  if (where.length) parts.push(`WHERE ${where.join(" AND ")}`);
  parts.push(`ORDER BY ${order}`);

  return { text: parts.join(" "), values };
}

export class PgCountryRepository implements CountryRepository {
  constructor(private readonly pool: SqlPool) {}

  async upsertMany(countries: MergedCountry[], refreshedAt: Date): Promise<UpsertResult> {
    const client = await this.pool.connect();
    let created = 0;
    let updated = 0;

    try {
      await client.query("BEGIN");

      for (const c of countries) {
        const result = await client.query<{ inserted: boolean }>(UPSERT_SQL, [
          c.name,
          normalizeName(c.name),
          c.capital,
          c.region,
          c.population,
          c.currency_code,
          c.exchange_rate,
          c.estimated_gdp,
          c.flag_url,
          refreshedAt,
        ]);
        if (result.rows[0]?.inserted) created++;
        else updated++;
      }

      await client.query("UPDATE app_status SET last_refreshed_at = $1 WHERE id = 1", [
        refreshedAt,
      ]);
      await client.query("COMMIT");
    } catch (err) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackErr) {
        logger.error("Rollback failed: %s", String(rollbackErr));
      }
      throw err;
    } finally {
      client.release();
    }

    return { total: created + updated, created, updated };
  }

  async findAll(filters: CountryFilters = {}): Promise<Country[]> {
    const { text, values } = buildListQuery(filters);
    const { rows } = await this.pool.query<CountryRow>(text, values);
    return rows.map(toCountry);
  }

  async findByName(name: string): Promise<Country | null> {
    const { rows } = await this.pool.query<CountryRow>(
      `SELECT ${COLUMNS} FROM countries WHERE name_key = $1`,
      [normalizeName(name)]
    );
    return rows[0] ? toCountry(rows[0]) : null;
  }

  async deleteByName(name: string): Promise<boolean> {
    const result = await this.pool.query("DELETE FROM countries WHERE name_key = $1", [
      normalizeName(name),
    ]);
    return (result.rowCount ?? 0) > 0;
  }

  async findTopByGdp(limit: number): Promise<Country[]> {
    const { rows } = await this.pool.query<CountryRow>(
      `SELECT ${COLUMNS} FROM countries ORDER BY estimated_gdp DESC NULLS LAST, id LIMIT $1`,
      [limit]
    );
    return rows.map(toCountry);
  }

  async getStatus(): Promise<StatusSummary> {
    const { rows } = await this.pool.query<{
      total_countries: number;
      last_refreshed_at: Date | string | null;
    }>(
      `SELECT
        (SELECT COUNT(*)::int FROM countries) AS total_countries,
        (SELECT last_refreshed_at FROM app_status WHERE id = 1) AS last_refreshed_at`
    );
    const row = rows[0];
    return {
      total_countries: row ? Number(row.total_countries) : 0,
      last_refreshed_at: row?.last_refreshed_at ? toIso(row.last_refreshed_at) : null,
    };
  }
}
