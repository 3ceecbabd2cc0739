import {
  stores,
  type Store,
  type NewStore,
  type StoreFile,
  type StoreProperties,
} from "./stores";
import {
  providers,
  providerCategoryEnum,
  type Provider,
  type NewProvider,
  type ProviderCategory,
} from "./providers";

// Stores reference providers by name only: a reference may be empty or name
// an external storage identity, so there is no foreign key between them.

// Tables
export { stores, providers, providerCategoryEnum };

// Types
export type {
  Store,
  NewStore,
  StoreFile,
  StoreProperties,
  Provider,
  NewProvider,
  ProviderCategory,
};
