import { z } from "zod";
import { ExternalServiceError } from "./errors";

const currencySchema = z
  .object({
    code: z.string().optional(),
    name: z.string().optional(),
    symbol: z.string().optional(),
  })
  .passthrough();

const restCountrySchema = z
  .object({
    name: z.string(),
    capital: z.string().nullish(),
    region: z.string().nullish(),
    population: z.number(),
    flag: z.string().nullish(),
    currencies: z.array(currencySchema).nullish(),
  })
  .passthrough();

const countriesResponseSchema = z.array(restCountrySchema);

const exchangeRateResponseSchema = z
  .object({
    base_code: z.string().optional(),
    time_last_update_utc: z.string().optional(),
    rates: z.record(z.string(), z.number()),
  })
  .passthrough();

export type Currency = z.infer<typeof currencySchema>;
export type RestCountry = z.infer<typeof restCountrySchema>;
export type ExchangeRateResponse = z.infer<typeof exchangeRateResponseSchema>;
export type ExchangeRates = Record<string, number>;

export interface FetchOptions {
  url: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

function isTimeout(err: unknown) {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

function describeSource(url: string) {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}

async function getJson<S extends z.ZodTypeAny>(options: FetchOptions, schema: S): Promise<z.infer<S>> {
  const { url, timeoutMs, fetchImpl = fetch } = options;
  const failure = `Could not fetch data from ${describeSource(url)}`;

  let response: Response;
  try {
    response = await fetchImpl(url, {
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    if (isTimeout(err)) {
      throw new ExternalServiceError(`${failure} - Request timed out`);
    }
    throw new ExternalServiceError(failure);
  }

  if (!response.ok) {
    throw new ExternalServiceError(`${failure} - HTTP ${response.status}`);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (err) {
    if (isTimeout(err)) {
      throw new ExternalServiceError(`${failure} - Request timed out`);
    }
    throw new ExternalServiceError(`${failure} - Invalid JSON`);
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ExternalServiceError(`${failure} - Unexpected payload`);
  }
  return parsed.data;
}

export function fetchCountries(options: FetchOptions): Promise<RestCountry[]> {
  return getJson(options, countriesResponseSchema);
}

export async function fetchExchangeRates(options: FetchOptions): Promise<ExchangeRates> {
  const data = await getJson(options, exchangeRateResponseSchema);
  return data.rates;
}
