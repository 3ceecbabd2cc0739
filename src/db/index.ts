import fs from "fs";
import path from "path";
import { drizzle } from "drizzle-orm/node-postgres";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import { Pool } from "pg";
import { env } from "../config/env";
import * as schema from "./schema";

// Re-export schema for convenience
export * from "./schema";

/**
 * Drizzle database over the application schema, independent of the driver
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

/**
 * An open database plus its lifecycle hooks.
 * Created once at process start and passed to every component that persists.
 */
export interface DatabaseConnection {
  db: Database;
  /** @returns true if connection successful, throws error otherwise */
  testConnection(): Promise<boolean>;
  /** Create tables and types that do not exist yet */
  applySchema(): Promise<void>;
  close(): Promise<void>;
}

export interface DatabaseOptions {
  connectionString?: string;
  maxConnections?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

const SCHEMA_SQL_PATH = path.resolve(__dirname, "../../sql/0000_init.sql");

/**
 * Read the DDL that creates the schema
 */
export function readSchemaSql(): string {
  return fs.readFileSync(SCHEMA_SQL_PATH, "utf8");
}

/**
 * Open a PostgreSQL connection pool wrapped in Drizzle
 */
export function createDatabase(
  options: DatabaseOptions = {},
): DatabaseConnection {
  const pool = new Pool({
    connectionString: options.connectionString ?? env.DATABASE_URL,
    max: options.maxConnections ?? env.DB_POOL_MAX,
    idleTimeoutMillis: options.idleTimeoutMillis ?? env.DB_IDLE_TIMEOUT_MS,
    connectionTimeoutMillis:
      options.connectionTimeoutMillis ?? env.DB_CONNECTION_TIMEOUT_MS,
  });

  const db = drizzle(pool, { schema });

  return {
    db,

    async testConnection(): Promise<boolean> {
      const client = await pool.connect();
      try {
        await client.query("SELECT 1");
        return true;
      } finally {
        client.release();
      }
    },

    async applySchema(): Promise<void> {
      // Simple query protocol: the file holds several statements
      await pool.query(readSchemaSql());
    },

    async close(): Promise<void> {
      await pool.end();
    },
  };
}
