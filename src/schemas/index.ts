import { z } from "zod";
import type { StoreFile } from "../db/schema";
import { ValidationError } from "../errors";

// ============================================================================
// Identity Schemas
// ============================================================================

// Owner and name are joined with "/" into ids, so neither may contain it
const identifierSchema = (label: string) =>
  z
    .string()
    .min(1, `${label} is required`)
    .max(100, `${label} must be 100 characters or less`)
    .regex(/^[^/]+$/, `${label} must not contain "/"`);

export const ownerSchema = identifierSchema("Owner");
export const nameSchema = identifierSchema("Name");

// Empty means "use the default provider"
export const providerReferenceSchema = z
  .string()
  .max(100, "Provider reference must be 100 characters or less")
  .regex(/^[^/]*$/, 'Provider reference must not contain "/"')
  .default("");

// ============================================================================
// Store Schemas
// ============================================================================

export const storeFileSchema: z.ZodType<StoreFile> = z.lazy(() =>
  z
    .object({
      key: z.string().min(1, "Key is required"),
      title: z.string(),
      size: z.number().int().nonnegative(),
      createdAt: z.string(),
      isLeaf: z.boolean(),
      url: z.string(),
      children: z.array(storeFileSchema),
    })
    .refine(
      (file) => !file.isLeaf || file.children.length === 0,
      "A leaf file cannot have children",
    ),
);

export const storePropertiesSchema = z.object({
  collectedTime: z.string(),
  subject: z.string(),
});

export const storeSchema = z.object({
  owner: ownerSchema,
  name: nameSchema,
  createdAt: z.date().optional(),
  displayName: z
    .string()
    .max(100, "Display name must be 100 characters or less")
    .default(""),
  storageProvider: providerReferenceSchema,
  modelProvider: providerReferenceSchema,
  embeddingProvider: providerReferenceSchema,
  frequency: z.number().int().nonnegative().default(0),
  limitMinutes: z.number().int().nonnegative().default(0),
  welcome: z
    .string()
    .max(100, "Welcome must be 100 characters or less")
    .default(""),
  prompt: z.string().default(""),
  fileTree: storeFileSchema.nullable().default(null),
  propertiesMap: z.record(storePropertiesSchema).default({}),
});

export type StoreInput = z.input<typeof storeSchema>;

/**
 * Full-column update: every column is written, so creation time is required
 */
export const updateStoreSchema = storeSchema.required({ createdAt: true });

export type UpdateStoreInput = z.input<typeof updateStoreSchema>;

// ============================================================================
// Provider Schemas
// ============================================================================

export const providerCategorySchema = z.enum(["Storage", "Model", "Embedding"]);

export const providerSchema = z.object({
  owner: ownerSchema,
  name: nameSchema,
  createdAt: z.date().optional(),
  displayName: z.string().max(100).default(""),
  category: providerCategorySchema,
  type: z.string().max(100).default(""),
  subType: z.string().max(100).default(""),
  clientId: z.string().max(100).default(""),
  clientSecret: z.string().default(""),
  providerUrl: z.string().max(200).default(""),
  maxBatchSize: z.number().int().positive().nullable().default(null),
  isDefault: z.boolean().default(false),
});

export type ProviderInput = z.input<typeof providerSchema>;

// ============================================================================
// Validation Helper
// ============================================================================

/**
 * Validate input against a Zod schema
 * Throws ValidationError if validation fails
 */
export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const errors = result.error.issues.map((e) => ({
      path: e.path.join("."),
      message: e.message,
    }));
    throw new ValidationError("Validation failed", { errors });
  }
  return result.data;
}
