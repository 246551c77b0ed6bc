import { describe, it, expect, beforeEach, vi } from "vitest";
import type { MergedCountry } from "../../utils/mergeCountryData";
import {
  buildListQuery,
  PgCountryRepository,
  UPSERT_SQL,
  type SqlPool,
} from "../countries.repository";

const COLUMNS =
  "id, name, capital, region, population, currency_code, exchange_rate, estimated_gdp, flag_url, last_refreshed_at";

const mockQuery = vi.fn();
const mockClientQuery = vi.fn();
const mockRelease = vi.fn();
const pool: SqlPool = {
  query: mockQuery,
  connect: vi.fn(async () => ({ query: mockClientQuery, release: mockRelease })),
};

function merged(name: string, overrides: Partial<MergedCountry> = {}): MergedCountry {
  return {
    name,
    capital: null,
    region: "Africa",
    population: 100,
    currency_code: "NGN",
    exchange_rate: 1600,
    estimated_gdp: 125,
    flag_url: null,
    ...overrides,
  };
}

const refreshedAt = new Date("2025-03-01T12:00:00.000Z");

describe("buildListQuery", () => {
  it("keeps persistence order without filters or sort", () => {
    expect(buildListQuery()).toEqual({
      text: `SELECT ${COLUMNS} FROM countries ORDER BY id`,
      values: [],
    });
  });

  it("combines filters with AND in parameter order", () => {
    expect(buildListQuery({ region: "Africa", currency: "NGN" })).toEqual({
      text: `SELECT ${COLUMNS} FROM countries WHERE region = $1 AND currency_code = $2 ORDER BY id`,
      values: ["Africa", "NGN"],
    });
  });

  it("numbers the currency parameter first when it is the only filter", () => {
    expect(buildListQuery({ currency: "EUR" }).text).toBe(
      `SELECT ${COLUMNS} FROM countries WHERE currency_code = $1 ORDER BY id`
    );
  });

  it.each([
    ["gdp_desc", "estimated_gdp DESC NULLS LAST, id"],
    ["gdp_asc", "estimated_gdp ASC NULLS LAST, id"],
    ["name_asc", "name ASC, id"],
    ["name_desc", "name DESC, id"],
    ["population_desc", "population DESC, id"],
    ["population_asc", "population ASC, id"],
  ] as const)("orders %s by %s", (sort, order) => {
    expect(buildListQuery({ sort }).text).toBe(
      `SELECT ${COLUMNS} FROM countries ORDER BY ${order}`
    );
  });
});

describe("PgCountryRepository", () => {
  let repo: PgCountryRepository;

  beforeEach(() => {
    vi.clearAllMocks();
    repo = new PgCountryRepository(pool);
  });

  it("upserts inside a transaction and counts created and updated rows", async () => {
    mockClientQuery.mockImplementation(async (sql: string) => {
      if (sql !== UPSERT_SQL) return { rows: [], rowCount: 0 };
      const inserted = mockClientQuery.mock.calls.filter(([s]) => s === UPSERT_SQL).length === 1;
      return { rows: [{ inserted }], rowCount: 1 };
    });

    const result = await repo.upsertMany(
      [merged("Nigeria"), merged("Ghana", { currency_code: null, exchange_rate: null, estimated_gdp: 0 })],
      refreshedAt
    );

    expect(result).toEqual({ total: 2, created: 1, updated: 1 });

    const statements = mockClientQuery.mock.calls.map(([sql]) => sql);
    expect(statements).toEqual([
      "BEGIN",
      UPSERT_SQL,
      UPSERT_SQL,
      "UPDATE app_status SET last_refreshed_at = $1 WHERE id = 1",
      "COMMIT",
    ]);
    expect(mockClientQuery.mock.calls[1]?.[1]).toEqual([
      "Nigeria",
      "nigeria",
      null,
      "Africa",
      100,
      "NGN",
      1600,
      125,
      null,
      refreshedAt,
    ]);
    expect(mockClientQuery.mock.calls[2]?.[1]?.slice(0, 2)).toEqual(["Ghana", "ghana"]);
    expect(mockClientQuery.mock.calls[3]?.[1]).toEqual([refreshedAt]);
    expect(mockRelease).toHaveBeenCalledOnce();
  });

  it("keys the upsert on the lower-cased name", async () => {
    mockClientQuery.mockResolvedValue({ rows: [{ inserted: false }], rowCount: 1 });

    const result = await repo.upsertMany([merged("NIGERIA")], refreshedAt);

    expect(result).toEqual({ total: 1, created: 0, updated: 1 });
    expect(mockClientQuery.mock.calls[1]?.[1]?.slice(0, 2)).toEqual(["NIGERIA", "nigeria"]);
  });

  it("rolls back and rethrows when a write fails", async () => {
    const failure = new Error("constraint violated");
    mockClientQuery.mockImplementation(async (sql: string) => {
      if (sql === UPSERT_SQL) throw failure;
      return { rows: [], rowCount: 0 };
    });

    await expect(repo.upsertMany([merged("Nigeria")], refreshedAt)).rejects.toBe(failure);

    const statements = mockClientQuery.mock.calls.map(([sql]) => sql);
    expect(statements).toEqual(["BEGIN", UPSERT_SQL, "ROLLBACK"]);
    expect(mockRelease).toHaveBeenCalledOnce();
  });

  it("maps rows, converting BIGINT population and timestamps", async () => {
    mockQuery.mockResolvedValueOnce({
      rows: [
        {
          id: 7,
          name: "Nigeria",
          capital: "Abuja",
          region: "Africa",
          population: "206139589",
          currency_code: "NGN",
          exchange_rate: 1600,
          estimated_gdp: null,
          flag_url: null,
          last_refreshed_at: refreshedAt,
        },
      ],
      rowCount: 1,
    });

    const country = await repo.findByName("nIgErIa");

    expect(mockQuery).toHaveBeenCalledWith(
      `SELECT ${COLUMNS} FROM countries WHERE name_key = $1`,
      ["nigeria"]
    );
    expect(country).toEqual({
      id: 7,
      name: "Nigeria",
      capital: "Abuja",
      region: "Africa",
      population: 206139589,
      currency_code: "NGN",
      exchange_rate: 1600,
      estimated_gdp: null,
      flag_url: null,
      last_refreshed_at: "2025-03-01T12:00:00.000Z",
    });
  });

  it("returns null when no row matches the name", async () => {
    mockQuery.mockResolvedValueOnce({ rows: [], rowCount: 0 });

    expect(await repo.findByName("Atlantis")).toBeNull();
  });

  it("passes surrounding whitespace through to the lookup", async () => {
    mockQuery.mockResolvedValueOnce({ rows: [], rowCount: 0 });

    expect(await repo.findByName(" NIGERIA ")).toBeNull();
    expect(mockQuery).toHaveBeenCalledWith(
      `SELECT ${COLUMNS} FROM countries WHERE name_key = $1`,
      [" nigeria "]
    );
  });

  it("reports whether a delete removed a row", async () => {
    mockQuery.mockResolvedValueOnce({ rows: [], rowCount: 1 });
    mockQuery.mockResolvedValueOnce({ rows: [], rowCount: 0 });

    expect(await repo.deleteByName("Ghana")).toBe(true);
    expect(await repo.deleteByName("Atlantis")).toBe(false);
    expect(mockQuery).toHaveBeenNthCalledWith(1, "DELETE FROM countries WHERE name_key = $1", [
      "ghana",
    ]);
  });

  it("reads the top countries by GDP with nulls last", async () => {
    mockQuery.mockResolvedValueOnce({ rows: [], rowCount: 0 });

    await repo.findTopByGdp(5);

    expect(mockQuery).toHaveBeenCalledWith(
      `SELECT ${COLUMNS} FROM countries ORDER BY estimated_gdp DESC NULLS LAST, id LIMIT $1`,
      [5]
    );
  });

  it("reads the status row", async () => {
    mockQuery.mockResolvedValueOnce({
      rows: [{ total_countries: 2, last_refreshed_at: refreshedAt }],
      rowCount: 1,
    });

    expect(await repo.getStatus()).toEqual({
      total_countries: 2,
      last_refreshed_at: "2025-03-01T12:00:00.000Z",
    });
  });

  it("reports no refresh before the first one", async () => {
    mockQuery.mockResolvedValueOnce({
      rows: [{ total_countries: 0, last_refreshed_at: null }],
      rowCount: 1,
    });

    expect(await repo.getStatus()).toEqual({ total_countries: 0, last_refreshed_at: null });
  });
});
