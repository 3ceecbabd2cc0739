export { createApp } from "./app";
export type { App, AppOptions, HealthStatus } from "./app";

export { loadEnv, env } from "./config/env";
export type { Env } from "./config/env";

export { createDatabase, readSchemaSql, stores, providers } from "./db";
export type {
  Database,
  DatabaseConnection,
  DatabaseOptions,
  Store,
  NewStore,
  StoreFile,
  StoreProperties,
  Provider,
  NewProvider,
  ProviderCategory,
} from "./db";

export {
  AppError,
  ValidationError,
  NotFoundError,
  ConflictError,
} from "./errors";
export { logger, createLogger } from "./logger";
export type { Logger } from "./logger";

export { validate } from "./schemas";
export type { StoreInput, UpdateStoreInput, ProviderInput } from "./schemas";

export { StoreRepository } from "./services/stores";
export { ProviderRepository } from "./services/providers";
export type { ProviderLookup } from "./services/providers";
export { ProviderResolver } from "./services/providerResolver";
export type { StoreProviderRefs } from "./services/providerResolver";
export {
  StoreVectorService,
  getBatchLimit,
  DEFAULT_BATCH_LIMIT,
} from "./services/vectors";
export {
  StoreFileService,
  buildFileTree,
  findFile,
  getChildrenMap,
} from "./services/fileTree";

export { getIdFromOwnerAndName, getOwnerAndNameFromId } from "./utils/id";

export type {
  StorageObject,
  StorageClient,
  EmbeddingClient,
  ProviderClientFactory,
  AddVectorsParams,
  VectorIndexer,
} from "./types/clients";
