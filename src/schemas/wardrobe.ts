/**
 * Wardrobe data contracts
 * Shapes of an extracted clothing item and of an outfit recommendation,
 * validated with zod before anything reaches the wardrobe or the client.
 */

import { z } from "zod";
import { SchemaValidationError } from "../errors.js";

export const GENDER_OPTIONS = ["Unisex", "Male", "Female"] as const;

/**
 * Field order used for export documents and wardrobe snapshots
 */
export const ITEM_FIELD_ORDER = [
  "id",
  "category",
  "description",
  "color",
  "gender",
  "fabric",
  "pattern",
  "fit",
  "sleeve_length",
  "neck_type",
  "occasion",
  "season",
  "features",
] as const;

function dedupe(values: string[]): string[] {
  return [...new Set(values)];
}

const text = z.string().trim();
const label = z.string().trim().min(1, "must not be empty");

// Sets arrive as JSON arrays; duplicates collapse, first-seen order is kept
const labelSet = z.array(label).transform(dedupe);

export const clothingAttributesSchema = z.object({
  category: label,
  description: label,
  color: z.array(label).min(1, "at least one color is required"),
  gender: text,
  fabric: text,
  pattern: text,
  fit: text,
  sleeve_length: text,
  neck_type: text,
  occasion: labelSet.refine((v) => v.length > 0, "at least one occasion is required"),
  season: labelSet.refine((v) => v.length > 0, "at least one season is required"),
  features: labelSet,
});

export type ClothingAttributes = z.infer<typeof clothingAttributesSchema>;

export const itemIdSchema = z.number().int().positive();

export type ItemId = z.infer<typeof itemIdSchema>;

export const exportedItemSchema = clothingAttributesSchema.extend({
  id: itemIdSchema,
});

export type ClothingItem = z.infer<typeof exportedItemSchema>;

export const wardrobeDocumentSchema = z
  .array(exportedItemSchema)
  .superRefine((items, ctx) => {
    const seen = new Set<number>();
    items.forEach((item, index) => {
      if (seen.has(item.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, "id"],
          message: `duplicate id ${item.id}`,
        });
      }
      seen.add(item.id);
    });
  });

export const outfitRecommendationSchema = z.object({
  recommended_items: z.array(z.union([z.string(), z.number()])),
  reasoning: text,
  style_tips: z.array(text),
});

export type OutfitRecommendation = z.infer<typeof outfitRecommendationSchema>;

/**
 * Canonical id for a reference that may be typed as a number or a string.
 * Returns null for anything that is not a positive integer.
 */
export function normalizeItemId(value: unknown): ItemId | null {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) && value > 0 ? value : null;
  }

  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!/^\d+$/.test(trimmed)) {
      return null;
    }
    const parsed = Number(trimmed);
    return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : null;
  }

  return null;
}

/**
 * Flatten zod issues into "path: message" lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  raw: unknown,
  message: string,
  status: 400 | 502 = 502
): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new SchemaValidationError(message, formatIssues(result.error), { status });
  }
  return result.data;
}

export function parseClothingAttributes(raw: unknown): ClothingAttributes {
  return parseOrThrow(
    clothingAttributesSchema,
    raw,
    "Clothing analysis did not match the expected attributes"
  );
}

export function parseOutfitRecommendation(raw: unknown): OutfitRecommendation {
  return parseOrThrow(
    outfitRecommendationSchema,
    raw,
    "Outfit recommendation did not match the expected shape"
  );
}

/**
 * Validate a wardrobe export document supplied by a client
 */
export function parseWardrobeDocument(raw: unknown): ClothingItem[] {
  return parseOrThrow(wardrobeDocumentSchema, raw, "Invalid wardrobe document", 400);
}

/**
 * Copy of an item with keys in export order
 */
export function orderItemFields(item: ClothingItem): ClothingItem {
  return {
    id: item.id,
    category: item.category,
    description: item.description,
    color: [...item.color],
    gender: item.gender,
    fabric: item.fabric,
    pattern: item.pattern,
    fit: item.fit,
    sleeve_length: item.sleeve_length,
    neck_type: item.neck_type,
    occasion: [...item.occasion],
    season: [...item.season],
    features: [...item.features],
  };
}
