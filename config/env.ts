import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug"]).optional(),
  DATABASE_URL: z.string().min(1, "is required"),
  DATABASE_SSL: booleanFlag,
  COUNTRIES_API_URL: z
    .string()
    .url()
    .default(
      "https://restcountries.com/v2/all?fields=name,capital,region,population,flag,currencies"
    ),
  EXCHANGE_RATE_API_URL: z
    .string()
    .url()
    .default("https://open.er-api.com/v6/latest/USD"),
  API_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  CACHE_DIR: z.string().min(1).default("cache"),
  ALLOWED_ORIGINS: z.string().default("*"),
});

export interface AppConfig {
  port: number;
  env: "development" | "production" | "test";
  logLevel: string;
  database: {
    connectionString: string;
    ssl: boolean;
  };
  countriesApiUrl: string;
  exchangeRateApiUrl: string;
  apiTimeoutMs: number;
  cacheDir: string;
  allowedOrigins: string[];
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")} ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  const env = parsed.data;
  return {
    port: env.PORT,
    env: env.NODE_ENV,
    logLevel: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "warn" : "info"),
    database: {
      connectionString: env.DATABASE_URL,
      ssl: env.DATABASE_SSL,
    },
    countriesApiUrl: env.COUNTRIES_API_URL,
    exchangeRateApiUrl: env.EXCHANGE_RATE_API_URL,
    apiTimeoutMs: env.API_TIMEOUT_MS,
    cacheDir: env.CACHE_DIR,
    allowedOrigins: env.ALLOWED_ORIGINS.split(",")
      .map((origin) => origin.trim())
      .filter(Boolean),
  };
}
