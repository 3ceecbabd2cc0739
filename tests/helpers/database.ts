import { PGlite } from "@electric-sql/pglite";
import { drizzle } from "drizzle-orm/pglite";
import { readSchemaSql, type DatabaseConnection } from "../../src/db";
import * as schema from "../../src/db/schema";

/**
 * In-process PostgreSQL with the application schema applied
 */
export async function createTestDatabase(): Promise<DatabaseConnection> {
  const client = new PGlite();

  const connection: DatabaseConnection = {
    db: drizzle(client, { schema }),

    async testConnection(): Promise<boolean> {
      await client.query("SELECT 1");
      return true;
    },

    async applySchema(): Promise<void> {
      await client.exec(readSchemaSql());
    },

    async close(): Promise<void> {
      await client.close();
    },
  };

  await connection.applySchema();
  return connection;
}
