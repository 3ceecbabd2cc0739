import type { Provider } from "../db/schema";

// ============================================
// Runtime Clients
// ============================================

/**
 * An object listed by a storage backend
 */
export interface StorageObject {
  key: string;
  size: number;
  lastModified: Date;
  url: string;
}

export interface StorageClient {
  /** List every object whose key starts with the prefix ("" lists all) */
  listObjects(prefix: string): Promise<StorageObject[]>;
}

export interface EmbeddingClient {
  embed(text: string): Promise<number[]>;
}

/**
 * Builds runtime clients from provider records.
 * Concrete backends (object stores, embedding APIs) live outside this package.
 */
export interface ProviderClientFactory {
  createStorageClient(provider: Provider): Promise<StorageClient>;
  /**
   * Client for a storage identity that has no provider record,
   * addressed by the raw reference stored on the store
   */
  createRawStorageClient(identifier: string): Promise<StorageClient>;
  createEmbeddingClient(provider: Provider): Promise<EmbeddingClient>;
}

// ============================================
// Indexing Pipeline
// ============================================

export interface AddVectorsParams {
  storageClient: StorageClient;
  embeddingClient: EmbeddingClient;
  /** Key prefix to index; "" means the whole store */
  prefix: string;
  storeName: string;
  embeddingProviderName: string;
  /** Model sub-type used to tag generated vectors */
  modelSubType: string;
  /** Maximum items per embedding call */
  batchLimit: number;
}

export interface VectorIndexer {
  addVectors(params: AddVectorsParams): Promise<boolean>;
}
