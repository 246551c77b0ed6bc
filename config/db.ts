import { Pool } from "pg";
import type { AppConfig } from "./env";

export function createPool(database: AppConfig["database"]) {
  return new Pool({
    connectionString: database.connectionString,
    ssl: database.ssl ? { rejectUnauthorized: false } : undefined,
  });
}
