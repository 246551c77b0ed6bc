import type { MergedCountry } from "../utils/mergeCountryData";

export interface Country extends MergedCountry {
  id: number;
  last_refreshed_at: string;
}

export const SORT_KEYS = [
  "gdp_desc",
  "gdp_asc",
  "name_asc",
  "name_desc",
  "population_desc",
  "population_asc",
] as const;

export type SortKey = (typeof SORT_KEYS)[number];

export interface CountryFilters {
  region?: string;
  currency?: string;
  sort?: SortKey;
}

export interface UpsertResult {
  total: number;
  created: number;
  updated: number;
}

export interface StatusSummary {
  total_countries: number;
  last_refreshed_at: string | null;
}

export interface CountryRepository {
  upsertMany(countries: MergedCountry[], refreshedAt: Date): Promise<UpsertResult>;
  findAll(filters?: CountryFilters): Promise<Country[]>;
  findByName(name: string): Promise<Country | null>;
  deleteByName(name: string): Promise<boolean>;
  findTopByGdp(limit: number): Promise<Country[]>;
  getStatus(): Promise<StatusSummary>;
}
