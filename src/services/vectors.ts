import type { Provider, Store } from "../db";
import { NotFoundError } from "../errors";
import { createLogger, type Logger } from "../logger";
import type { VectorIndexer } from "../types/clients";
import type { ProviderResolver } from "./providerResolver";
import type { StoreRepository } from "./stores";

/** Effectively "index everything in one pass" */
export const DEFAULT_BATCH_LIMIT = 100000;

/**
 * Batch limits for embedding backends with tight per-call rate or size
 * limits, used when the provider record sets no maxBatchSize
 */
const BATCH_LIMITS_BY_TYPE = new Map<string, number>([["OpenAI", 3]]);

/**
 * Items per indexing call for an embedding provider
 */
export function getBatchLimit(
  provider: Pick<Provider, "type" | "maxBatchSize">,
): number {
  if (provider.maxBatchSize !== null && provider.maxBatchSize > 0) {
    return provider.maxBatchSize;
  }

  return BATCH_LIMITS_BY_TYPE.get(provider.type) ?? DEFAULT_BATCH_LIMIT;
}

/**
 * Rebuilds the retrieval vectors of a store.
 * One attempt per call: no retry, no rollback, no locking between
 * concurrent refreshes of the same store.
 */
export class StoreVectorService {
  private readonly log: Logger;

  constructor(
    private readonly stores: Pick<StoreRepository, "getStoreById">,
    private readonly resolver: ProviderResolver,
    private readonly indexer: VectorIndexer,
  ) {
    this.log = createLogger("store-vectors");
  }

  /**
   * Resolve the store's providers and re-index its storage
   */
  async refreshStoreVectors(store: Store): Promise<boolean> {
    const storageClient = await this.resolver.resolveStorageClient(store);
    const modelProvider = await this.resolver.resolveModelProvider(store);
    const embeddingProvider =
      await this.resolver.resolveEmbeddingProvider(store);
    const embeddingClient =
      await this.resolver.createEmbeddingClient(embeddingProvider);

    const batchLimit = getBatchLimit(embeddingProvider);
    const log = this.log.child({ owner: store.owner, store: store.name });

    log.info(
      {
        embeddingProvider: embeddingProvider.name,
        embeddingType: embeddingProvider.type,
        modelSubType: modelProvider.subType,
        batchLimit,
      },
      "Refreshing store vectors",
    );

    const ok = await this.indexer.addVectors({
      storageClient,
      embeddingClient,
      prefix: "",
      storeName: store.name,
      embeddingProviderName: embeddingProvider.name,
      modelSubType: modelProvider.subType,
      batchLimit,
    });

    log.info({ ok }, "Store vector refresh finished");
    return ok;
  }

  /**
   * Refresh the vectors of the store with the given "owner/name" id
   */
  async refreshStoreVectorsById(id: string): Promise<boolean> {
    const store = await this.stores.getStoreById(id);
    if (!store) {
      throw new NotFoundError("Store", id);
    }

    return this.refreshStoreVectors(store);
  }
}
