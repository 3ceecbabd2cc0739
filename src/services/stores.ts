import { and, asc, desc, eq } from "drizzle-orm";
import { stores, type Database, type Store } from "../db";
import {
  validate,
  storeSchema,
  updateStoreSchema,
  type StoreInput,
  type UpdateStoreInput,
} from "../schemas";
import { getOwnerAndNameFromId } from "../utils/id";

/**
 * Persistence boundary for stores, keyed by (owner, name)
 */
export class StoreRepository {
  constructor(private readonly db: Database) {}

  /**
   * List stores of every owner, grouped by owner, newest first
   */
  async getGlobalStores(): Promise<Store[]> {
    return this.db
      .select()
      .from(stores)
      .orderBy(asc(stores.owner), desc(stores.createdAt));
  }

  /**
   * List an owner's stores, newest first
   */
  async getStores(owner: string): Promise<Store[]> {
    return this.db.query.stores.findMany({
      where: eq(stores.owner, owner),
      orderBy: desc(stores.createdAt),
    });
  }

  /**
   * Pick the store an owner works with when none is named:
   * the newest one with a storage provider, else the newest one
   */
  async getDefaultStore(owner: string): Promise<Store | null> {
    const ownerStores = await this.getStores(owner);

    const withStorage = ownerStores.find(
      (store) => store.storageProvider !== "",
    );
    if (withStorage) {
      return withStorage;
    }

    return ownerStores[0] ?? null;
  }

  /**
   * Get a store by owner and name
   */
  async getStore(owner: string, name: string): Promise<Store | null> {
    const store = await this.db.query.stores.findFirst({
      where: and(eq(stores.owner, owner), eq(stores.name, name)),
    });

    return store ?? null;
  }

  /**
   * Get a store by its "owner/name" id
   */
  async getStoreById(id: string): Promise<Store | null> {
    const { owner, name } = getOwnerAndNameFromId(id);
    return this.getStore(owner, name);
  }

  /**
   * Insert a new store
   * Duplicate keys surface as the database error
   */
  async addStore(input: StoreInput): Promise<boolean> {
    const data = validate(storeSchema, input);

    const result = await this.db
      .insert(stores)
      .values(data)
      .returning({ name: stores.name });

    return result.length !== 0;
  }

  /**
   * Overwrite every column of the store identified by id.
   * The store may be renamed by passing a different owner or name.
   * Returns false if the store does not exist. The existence check is not
   * atomic with the write: concurrent updates are last-writer-wins.
   */
  async updateStore(id: string, input: UpdateStoreInput): Promise<boolean> {
    const { owner, name } = getOwnerAndNameFromId(id);
    const data = validate(updateStoreSchema, input);

    const existing = await this.getStore(owner, name);
    if (!existing) {
      return false;
    }

    const result = await this.db
      .update(stores)
      .set({
        owner: data.owner,
        name: data.name,
        createdAt: data.createdAt,
        displayName: data.displayName,
        storageProvider: data.storageProvider,
        modelProvider: data.modelProvider,
        embeddingProvider: data.embeddingProvider,
        frequency: data.frequency,
        limitMinutes: data.limitMinutes,
        welcome: data.welcome,
        prompt: data.prompt,
        fileTree: data.fileTree,
        propertiesMap: data.propertiesMap,
      })
      .where(and(eq(stores.owner, owner), eq(stores.name, name)))
      .returning({ name: stores.name });

    return result.length !== 0;
  }

  /**
   * Hard-delete a store
   * Returns false, without error, when nothing matched
   */
  async deleteStore(key: Pick<Store, "owner" | "name">): Promise<boolean> {
    const result = await this.db
      .delete(stores)
      .where(and(eq(stores.owner, key.owner), eq(stores.name, key.name)))
      .returning({ name: stores.name });

    return result.length !== 0;
  }
}
