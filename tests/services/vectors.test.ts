import { beforeEach, describe, expect, it, vi } from "vitest";
import { NotFoundError } from "../../src/errors";
import { ProviderResolver } from "../../src/services/providerResolver";
import {
  DEFAULT_BATCH_LIMIT,
  StoreVectorService,
  getBatchLimit,
} from "../../src/services/vectors";
import type { Store } from "../../src/db";
import {
  FakeClientFactory,
  InMemoryProviderLookup,
  RecordingIndexer,
  defaultProviders,
  makeProvider,
  makeStore,
} from "../helpers/fakes";

describe("getBatchLimit", () => {
  it("limits OpenAI embeddings to 3 items per call", () => {
    expect(getBatchLimit({ type: "OpenAI", maxBatchSize: null })).toBe(3);
  });

  it("uses the default for other types", () => {
    expect(getBatchLimit({ type: "Ollama", maxBatchSize: null })).toBe(100000);
    expect(getBatchLimit({ type: "", maxBatchSize: null })).toBe(
      DEFAULT_BATCH_LIMIT,
    );
    expect(getBatchLimit({ type: "openai", maxBatchSize: null })).toBe(100000);
    expect(getBatchLimit({ type: "constructor", maxBatchSize: null })).toBe(
      100000,
    );
  });

  it("prefers the provider's own maximum", () => {
    expect(getBatchLimit({ type: "OpenAI", maxBatchSize: 16 })).toBe(16);
    expect(getBatchLimit({ type: "Cohere", maxBatchSize: 96 })).toBe(96);
  });
});

describe("StoreVectorService", () => {
  let clients: FakeClientFactory;
  let indexer: RecordingIndexer;
  let resolver: ProviderResolver;
  let stores: Store[];
  let service: StoreVectorService;

  beforeEach(() => {
    clients = new FakeClientFactory();
    indexer = new RecordingIndexer();
    resolver = new ProviderResolver(
      new InMemoryProviderLookup([
        ...defaultProviders(),
        makeProvider({
          owner: "t1",
          name: "emb-openai",
          category: "Embedding",
          type: "OpenAI",
          subType: "text-embedding-3-small",
        }),
      ]),
      clients,
    );
    stores = [];
    service = new StoreVectorService(
      {
        getStoreById: async (id: string) =>
          stores.find((s) => `${s.owner}/${s.name}` === id) ?? null,
      },
      resolver,
      indexer,
    );
  });

  it("indexes an OpenAI-embedded store in batches of 3", async () => {
    const store = makeStore({
      owner: "t1",
      name: "s1",
      embeddingProvider: "emb-openai",
    });

    await expect(service.refreshStoreVectors(store)).resolves.toBe(true);

    expect(indexer.calls).toHaveLength(1);
    const [call] = indexer.calls;
    expect(call.batchLimit).toBe(3);
    expect(call.prefix).toBe("");
    expect(call.storeName).toBe("s1");
    expect(call.embeddingProviderName).toBe("emb-openai");
    expect(call.modelSubType).toBe("llama3");
    expect(call.storageClient).toMatchObject({ identity: "provider:default-storage" });
    expect(call.embeddingClient).toMatchObject({ providerName: "emb-openai" });
  });

  it("indexes other embedding backends in one pass", async () => {
    const store = makeStore({ owner: "t1", name: "s2" });

    await service.refreshStoreVectors(store);

    expect(indexer.calls[0].batchLimit).toBe(100000);
    expect(indexer.calls[0].embeddingProviderName).toBe("default-embedding");
  });

  it("returns the pipeline outcome unchanged", async () => {
    indexer.result = false;

    await expect(
      service.refreshStoreVectors(makeStore({ owner: "t1", name: "s1" })),
    ).resolves.toBe(false);
  });

  it("propagates pipeline errors without retrying", async () => {
    const error = new Error("index unavailable");
    indexer.error = error;

    await expect(
      service.refreshStoreVectors(makeStore({ owner: "t1", name: "s1" })),
    ).rejects.toBe(error);
    expect(indexer.calls).toHaveLength(1);
  });

  it("aborts before indexing when a provider cannot be resolved", async () => {
    const store = makeStore({
      owner: "t1",
      name: "s1",
      modelProvider: "missing",
    });
    const createEmbeddingClient = vi.spyOn(clients, "createEmbeddingClient");

    await expect(service.refreshStoreVectors(store)).rejects.toBeInstanceOf(
      NotFoundError,
    );
    expect(createEmbeddingClient).not.toHaveBeenCalled();
    expect(indexer.calls).toHaveLength(0);
  });

  it("aborts before indexing when the embedding client fails", async () => {
    const error = new Error("bad api key");
    clients.embeddingError = error;

    await expect(
      service.refreshStoreVectors(makeStore({ owner: "t1", name: "s1" })),
    ).rejects.toBe(error);
    expect(indexer.calls).toHaveLength(0);
  });

  it("refreshes a store loaded by id", async () => {
    stores.push(
      makeStore({ owner: "t1", name: "s1", embeddingProvider: "emb-openai" }),
    );

    await expect(service.refreshStoreVectorsById("t1/s1")).resolves.toBe(true);
    expect(indexer.calls[0].batchLimit).toBe(3);
  });

  it("fails for an unknown store id", async () => {
    await expect(service.refreshStoreVectorsById("t1/nope")).rejects.toThrow(
      "Store not found: t1/nope",
    );
  });
});
