import { env } from "./config/env";
import { createDatabase, type DatabaseConnection } from "./db";
import { logger } from "./logger";
import { StoreFileService } from "./services/fileTree";
import { ProviderResolver } from "./services/providerResolver";
import { ProviderRepository } from "./services/providers";
import { StoreRepository } from "./services/stores";
import { StoreVectorService } from "./services/vectors";
import type { ProviderClientFactory, VectorIndexer } from "./types/clients";

export interface AppOptions {
  clients: ProviderClientFactory;
  indexer: VectorIndexer;
  /** Defaults to a PostgreSQL pool configured from the environment */
  database?: DatabaseConnection;
  defaultProviderOwner?: string;
}

export interface HealthStatus {
  status: "healthy" | "degraded";
  database: "connected" | "disconnected";
}

export interface App {
  stores: StoreRepository;
  providers: ProviderRepository;
  resolver: ProviderResolver;
  vectors: StoreVectorService;
  files: StoreFileService;
  health(): Promise<HealthStatus>;
  close(): Promise<void>;
}

/**
 * Wire every component over one database connection
 */
export function createApp(options: AppOptions): App {
  const database = options.database ?? createDatabase();

  const stores = new StoreRepository(database.db);
  const providers = new ProviderRepository(
    database.db,
    options.defaultProviderOwner ?? env.DEFAULT_PROVIDER_OWNER,
  );
  const resolver = new ProviderResolver(providers, options.clients);

  return {
    stores,
    providers,
    resolver,
    vectors: new StoreVectorService(stores, resolver, options.indexer),
    files: new StoreFileService(stores, resolver),

    async health(): Promise<HealthStatus> {
      let dbHealthy = false;

      try {
        dbHealthy = await database.testConnection();
      } catch (error) {
        logger.error({ err: error }, "Database health check failed");
      }

      return {
        status: dbHealthy ? "healthy" : "degraded",
        database: dbHealthy ? "connected" : "disconnected",
      };
    },

    async close(): Promise<void> {
      await database.close();
    },
  };
}
