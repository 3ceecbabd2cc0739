import { and, asc, eq } from "drizzle-orm";
import {
  providers,
  type Database,
  type Provider,
  type ProviderCategory,
} from "../db";
import { validate, providerSchema, type ProviderInput } from "../schemas";
import { getOwnerAndNameFromId } from "../utils/id";

/**
 * Read side of the provider records, as needed to resolve a store's providers
 */
export interface ProviderLookup {
  getProvider(id: string): Promise<Provider | null>;
  getDefaultProvider(category: ProviderCategory): Promise<Provider | null>;
}

export class ProviderRepository implements ProviderLookup {
  /**
   * @param defaultOwner - owner whose providers serve as system defaults
   */
  constructor(
    private readonly db: Database,
    private readonly defaultOwner: string,
  ) {}

  /**
   * Get a provider by its "owner/name" id
   */
  async getProvider(id: string): Promise<Provider | null> {
    const { owner, name } = getOwnerAndNameFromId(id);

    const provider = await this.db.query.providers.findFirst({
      where: and(eq(providers.owner, owner), eq(providers.name, name)),
    });

    return provider ?? null;
  }

  /**
   * Oldest provider of the category flagged as default by the system owner
   */
  async getDefaultProvider(
    category: ProviderCategory,
  ): Promise<Provider | null> {
    const provider = await this.db.query.providers.findFirst({
      where: and(
        eq(providers.owner, this.defaultOwner),
        eq(providers.category, category),
        eq(providers.isDefault, true),
      ),
      orderBy: asc(providers.createdAt),
    });

    return provider ?? null;
  }

  /**
   * Insert a new provider
   */
  async addProvider(input: ProviderInput): Promise<boolean> {
    const data = validate(providerSchema, input);

    const result = await this.db
      .insert(providers)
      .values(data)
      .returning({ name: providers.name });

    return result.length !== 0;
  }
}
