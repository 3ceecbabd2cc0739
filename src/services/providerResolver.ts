import type { Provider, ProviderCategory, Store } from "../db";
import { NotFoundError } from "../errors";
import { createLogger, type Logger } from "../logger";
import type {
  EmbeddingClient,
  ProviderClientFactory,
  StorageClient,
} from "../types/clients";
import { getIdFromOwnerAndName } from "../utils/id";
import type { ProviderLookup } from "./providers";

/**
 * The parts of a store that name its providers
 */
export type StoreProviderRefs = Pick<
  Store,
  "owner" | "storageProvider" | "modelProvider" | "embeddingProvider"
>;

/**
 * Maps a store's provider references to provider records and runtime clients.
 * An empty reference resolves to the system default for its category; a
 * non-empty one names a provider in the store owner's namespace.
 */
export class ProviderResolver {
  private readonly log: Logger;

  constructor(
    private readonly providers: ProviderLookup,
    private readonly clients: ProviderClientFactory,
  ) {
    this.log = createLogger("provider-resolver");
  }

  /**
   * Storage client for a store.
   * A reference without a provider record is handed to the factory as a raw
   * storage identity instead of failing.
   */
  async resolveStorageClient(store: StoreProviderRefs): Promise<StorageClient> {
    const provider = await this.lookup(
      store.owner,
      store.storageProvider,
      "Storage",
    );

    if (provider) {
      return this.clients.createStorageClient(provider);
    }

    this.log.debug(
      { owner: store.owner, storageProvider: store.storageProvider },
      "No storage provider record, using raw storage identity",
    );
    return this.clients.createRawStorageClient(store.storageProvider);
  }

  /**
   * Model provider for a store; the default one when the reference is empty
   */
  async resolveModelProvider(store: StoreProviderRefs): Promise<Provider> {
    return this.require(store.owner, store.modelProvider, "Model");
  }

  /**
   * Embedding provider for a store; the default one when the reference is empty
   */
  async resolveEmbeddingProvider(store: StoreProviderRefs): Promise<Provider> {
    return this.require(store.owner, store.embeddingProvider, "Embedding");
  }

  /**
   * Embedding client for a resolved provider
   */
  async createEmbeddingClient(provider: Provider): Promise<EmbeddingClient> {
    return this.clients.createEmbeddingClient(provider);
  }

  private async lookup(
    owner: string,
    reference: string,
    category: ProviderCategory,
  ): Promise<Provider | null> {
    if (reference === "") {
      return this.providers.getDefaultProvider(category);
    }

    return this.providers.getProvider(getIdFromOwnerAndName(owner, reference));
  }

  private async require(
    owner: string,
    reference: string,
    category: ProviderCategory,
  ): Promise<Provider> {
    const provider = await this.lookup(owner, reference, category);
    if (!provider) {
      throw reference === ""
        ? new NotFoundError(`Default ${category} provider`)
        : new NotFoundError(
            `${category} provider`,
            getIdFromOwnerAndName(owner, reference),
          );
    }

    return provider;
  }
}
