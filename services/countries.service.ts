import fs from "fs/promises";
import type {
  Country,
  CountryFilters,
  CountryRepository,
  StatusSummary,
} from "../models/country";
import { NotFoundError } from "../utils/errors";
import type { ExchangeRates, RestCountry } from "../utils/fetchCountryData";
import {
  generateSummaryImage,
  summaryImagePath,
  type SummaryImageInput,
} from "../utils/generateSummaryImage";
import logger from "../utils/logger";
import { buildCountryExchangeData, type RandomSource } from "../utils/mergeCountryData";

export interface RefreshSummary {
  message: string;
  total_countries: number;
  created: number;
  updated: number;
  last_refreshed_at: string;
}

export interface CountryServiceDeps {
  repository: CountryRepository;
  fetchCountries: () => Promise<RestCountry[]>;
  fetchExchangeRates: () => Promise<ExchangeRates>;
  cacheDir: string;
  renderImage?: (cacheDir: string, input: SummaryImageInput) => Promise<string>;
  random?: RandomSource;
  now?: () => Date;
}

const TOP_GDP_LIMIT = 5;

export class CountryService {
  private readonly renderImage: NonNullable<CountryServiceDeps["renderImage"]>;
  private readonly random: RandomSource;
  private readonly now: () => Date;

  constructor(private readonly deps: CountryServiceDeps) {
    this.renderImage = deps.renderImage ?? generateSummaryImage;
    this.random = deps.random ?? Math.random;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Fetches both upstream sources, merges them in memory and only then writes.
   * An upstream failure rejects before anything is persisted or rendered.
   */
  async refresh(): Promise<RefreshSummary> {
    const [countries, rates] = await Promise.all([
      this.deps.fetchCountries(),
      this.deps.fetchExchangeRates(),
    ]);

    const merged = buildCountryExchangeData(countries, rates, this.random);
    for (const reason of merged.skipped) {
      logger.warn("Skipping country record (%s)", reason);
    }

    const refreshedAt = this.now();
    const result = await this.deps.repository.upsertMany(merged.countries, refreshedAt);
    logger.info(
      "Countries refreshed: %d total, %d created, %d updated",
      result.total,
      result.created,
      result.updated
    );

    const [status, top] = await Promise.all([
      this.deps.repository.getStatus(),
      this.deps.repository.findTopByGdp(TOP_GDP_LIMIT),
    ]);
    const imgPath = await this.renderImage(this.deps.cacheDir, {
      totalCountries: status.total_countries,
      topCountries: top,
      lastRefreshedAt: refreshedAt,
    });
    logger.info("Summary image generated: %s", imgPath);

    return {
      message: "Countries refreshed successfully",
      total_countries: result.total,
      created: result.created,
      updated: result.updated,
      last_refreshed_at: refreshedAt.toISOString(),
    };
  }

  list(filters: CountryFilters = {}): Promise<Country[]> {
    return this.deps.repository.findAll(filters);
  }

  async getByName(name: string): Promise<Country> {
    const country = await this.deps.repository.findByName(name);
    if (!country) throw new NotFoundError("Country not found");
    return country;
  }

  async deleteByName(name: string): Promise<void> {
    const deleted = await this.deps.repository.deleteByName(name);
    if (!deleted) throw new NotFoundError("Country not found");
  }

  status(): Promise<StatusSummary> {
    return this.deps.repository.getStatus();
  }

  async summaryImage(): Promise<string> {
    const imgPath = summaryImagePath(this.deps.cacheDir);
    try {
      await fs.access(imgPath);
    } catch {
      throw new NotFoundError("Summary image not found");
    }
    return imgPath;
  }
}
