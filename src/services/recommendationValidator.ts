/**
 * Recommendation validation
 *
 * Resolves every id a recommendation references against the wardrobe it was
 * produced for. Unresolvable references are dropped and reported; a
 * recommendation with nothing left to show is rejected outright, so the
 * display layer never dereferences a missing item.
 */

import { ReferentialError } from "../errors.js";
import type { ClothingItem, ItemId, OutfitRecommendation } from "../schemas/wardrobe.js";
import type { WardrobeStore } from "./wardrobeStore.js";

export interface ValidatedRecommendation {
  items: ClothingItem[];
  recommended_items: ItemId[];
  /** Raw references with no matching item */
  dropped_item_ids: string[];
  reasoning: string;
  style_tips: string[];
}

export function validateRecommendation(
  recommendation: OutfitRecommendation,
  store: WardrobeStore
): ValidatedRecommendation {
  const items: ClothingItem[] = [];
  const dropped: string[] = [];
  const seen = new Set<ItemId>();

  for (const reference of recommendation.recommended_items) {
    const item = store.get(reference);

    if (!item) {
      dropped.push(String(reference));
      continue;
    }

    // The same piece listed twice is still one piece
    if (seen.has(item.id)) {
      continue;
    }

    seen.add(item.id);
    items.push(item);
  }

  if (items.length === 0) {
    throw new ReferentialError("No valid items recommended", dropped);
  }

  if (dropped.length > 0) {
    console.warn(`[Stylist] Dropped unknown item ids from recommendation: ${dropped.join(", ")}`);
  }

  return {
    items,
    recommended_items: items.map((item) => item.id),
    dropped_item_ids: dropped,
    reasoning: recommendation.reasoning,
    style_tips: recommendation.style_tips,
  };
}
