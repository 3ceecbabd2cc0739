import {
  integer,
  jsonb,
  pgTable,
  primaryKey,
  text,
  timestamp,
  varchar,
} from "drizzle-orm/pg-core";

/**
 * Node of a store's document hierarchy.
 * Leaves are files, other nodes are directories. Persisted as JSON inside
 * the owning store; the key-to-child index is derived on demand.
 */
export interface StoreFile {
  key: string;
  title: string;
  size: number;
  createdAt: string; // ISO timestamp
  isLeaf: boolean;
  url: string;
  children: StoreFile[];
}

/**
 * Metadata for one ingested unit, e.g. a subject collected on a given date
 */
export interface StoreProperties {
  collectedTime: string;
  subject: string;
}

/**
 * Stores bind a tenant's document collection to its storage, model and
 * embedding providers. An empty provider reference means "use the default".
 */
export const stores = pgTable(
  "stores",
  {
    owner: varchar("owner", { length: 100 }).notNull(),
    name: varchar("name", { length: 100 }).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
    displayName: varchar("display_name", { length: 100 })
      .notNull()
      .default(""),

    storageProvider: varchar("storage_provider", { length: 100 })
      .notNull()
      .default(""),
    modelProvider: varchar("model_provider", { length: 100 })
      .notNull()
      .default(""),
    embeddingProvider: varchar("embedding_provider", { length: 100 })
      .notNull()
      .default(""),

    frequency: integer("frequency").notNull().default(0),
    limitMinutes: integer("limit_minutes").notNull().default(0),
    welcome: varchar("welcome", { length: 100 }).notNull().default(""),
    prompt: text("prompt").notNull().default(""),

    fileTree: jsonb("file_tree").$type<StoreFile>(),
    propertiesMap: jsonb("properties_map")
      .$type<Record<string, StoreProperties>>()
      .notNull()
      .default({}),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.owner, table.name] }),
  }),
);

export type Store = typeof stores.$inferSelect;
export type NewStore = typeof stores.$inferInsert;
