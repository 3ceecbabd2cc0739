import {
  boolean,
  integer,
  pgEnum,
  pgTable,
  primaryKey,
  text,
  timestamp,
  varchar,
} from "drizzle-orm/pg-core";

/**
 * Kinds of backend a provider can stand for
 */
export const providerCategoryEnum = pgEnum("provider_category", [
  "Storage",
  "Model",
  "Embedding",
]);

/**
 * Owner-scoped records describing how to reach an external storage,
 * generative model or embedding backend.
 */
export const providers = pgTable(
  "providers",
  {
    owner: varchar("owner", { length: 100 }).notNull(),
    name: varchar("name", { length: 100 }).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
    displayName: varchar("display_name", { length: 100 })
      .notNull()
      .default(""),
    category: providerCategoryEnum("category").notNull(),
    // Backend family, e.g. "OpenAI"
    type: varchar("type", { length: 100 }).notNull().default(""),
    // Model or flavour within the family, e.g. "text-embedding-3-small"
    subType: varchar("sub_type", { length: 100 }).notNull().default(""),
    clientId: varchar("client_id", { length: 100 }).notNull().default(""),
    clientSecret: text("client_secret").notNull().default(""),
    providerUrl: varchar("provider_url", { length: 200 })
      .notNull()
      .default(""),
    // Items per indexing call; null falls back to the per-type limit
    maxBatchSize: integer("max_batch_size"),
    isDefault: boolean("is_default").notNull().default(false),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.owner, table.name] }),
  }),
);

export type Provider = typeof providers.$inferSelect;
export type NewProvider = typeof providers.$inferInsert;
export type ProviderCategory = (typeof providerCategoryEnum.enumValues)[number];
