import type { ExchangeRates, RestCountry } from "./fetchCountryData";

/** Returns a value in [0, 1), like Math.random. */
export type RandomSource = () => number;

export interface MergedCountry {
  name: string;
  capital: string | null;
  region: string | null;
  population: number;
  currency_code: string | null;
  exchange_rate: number | null;
  estimated_gdp: number | null;
  flag_url: string | null;
}

export interface MergeResult {
  countries: MergedCountry[];
  skipped: string[];
}

const MIN_MULTIPLIER = 1000;
const MAX_MULTIPLIER = 2000;

export function drawMultiplier(random: RandomSource) {
  return MIN_MULTIPLIER + random() * (MAX_MULTIPLIER - MIN_MULTIPLIER);
}

function lookupRate(rates: ExchangeRates, code: string): number | null {
  if (!Object.prototype.hasOwnProperty.call(rates, code)) return null;
  const rate = rates[code];
  return typeof rate === "number" && Number.isFinite(rate) && rate > 0 ? rate : null;
}

export function mergeCountry(
  country: RestCountry,
  rates: ExchangeRates,
  random: RandomSource = Math.random
): MergedCountry {
  const base = {
    name: country.name.trim(),
    capital: country.capital || null,
    region: country.region || null,
    population: country.population,
    flag_url: country.flag || null,
  };

  const code = country.currencies?.[0]?.code?.trim();
  if (!code) {
    return { ...base, currency_code: null, exchange_rate: null, estimated_gdp: 0 };
  }

  const rate = lookupRate(rates, code);
  if (rate === null) {
    return { ...base, currency_code: code, exchange_rate: null, estimated_gdp: null };
  }

  const estimated_gdp = (country.population * drawMultiplier(random)) / rate;
  return { ...base, currency_code: code, exchange_rate: rate, estimated_gdp };
}

function invalidReason(country: RestCountry): string | null {
  if (!country.name.trim()) return "name is required";
  if (!Number.isInteger(country.population) || country.population <= 0) {
    return "population must be a positive integer";
  }
  return null;
}

/**
 * Joins every country to its first currency's rate. Records that cannot be
 * stored (blank name, non-positive population) are reported in `skipped`.
 */
export function buildCountryExchangeData(
  countries: RestCountry[],
  rates: ExchangeRates,
  random: RandomSource = Math.random
): MergeResult {
  const merged: MergedCountry[] = [];
  const skipped: string[] = [];

  for (const country of countries) {
    const reason = invalidReason(country);
    if (reason) {
      skipped.push(`${country.name || "<unnamed>"}: ${reason}`);
      continue;
    }
    merged.push(mergeCountry(country, rates, random));
  }

  return { countries: merged, skipped };
}
