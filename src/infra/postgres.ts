import { Pool } from "pg";
import { processLogger } from "./logger";

export const createPostgresPool = (databaseUrl: string): Pool => {
  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: process.env.PGSSL === "true" ? { rejectUnauthorized: false } : undefined
  });

  pool.on("error", (error: Error) => {
    processLogger.error("postgres_pool_error", error.message);
  });

  return pool;
};
