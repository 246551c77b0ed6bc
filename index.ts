import { createApp } from "./app";
import { createPool } from "./config/db";
import { loadConfig } from "./config/env";
import { initializeDB } from "./config/initDB";
import { fromPgPool, PgCountryRepository } from "./repositories/countries.repository";
import { CountryService } from "./services/countries.service";
import { fetchCountries, fetchExchangeRates } from "./utils/fetchCountryData";
import logger, { setLogLevel } from "./utils/logger";

const config = loadConfig();
setLogLevel(config.logLevel);

const pool = createPool(config.database);
pool.on("error", (err) => logger.error("Idle database client error: %s", err.message));

await initializeDB(pool);
logger.info("Database initialized successfully");

const service = new CountryService({
  repository: new PgCountryRepository(fromPgPool(pool)),
  fetchCountries: () =>
    fetchCountries({ url: config.countriesApiUrl, timeoutMs: config.apiTimeoutMs }),
  fetchExchangeRates: () =>
    fetchExchangeRates({ url: config.exchangeRateApiUrl, timeoutMs: config.apiTimeoutMs }),
  cacheDir: config.cacheDir,
});

const app = createApp({ service, allowedOrigins: config.allowedOrigins });

const server = app.listen(config.port, () => {
  logger.info(`Server is running on ${config.port}`);
});

const shutdown = (signal: string) => {
  logger.info(`${signal} received, shutting down`);
  server.close(() => {
    pool
      .end()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error("Error closing database pool: %s", String(err));
        process.exit(1);
      });
  });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
