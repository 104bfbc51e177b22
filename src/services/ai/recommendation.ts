/**
 * Recommendation adapter
 * Asks the model for an outfit drawn from the supplied wardrobe snapshot.
 * The "only use ids from the wardrobe" rule is an instruction, not a
 * guarantee; results always go through the recommendation validator.
 */

import type { ItemId } from "../../schemas/wardrobe.js";
import type { AdapterCallOptions } from "./extraction.js";
import type { StructuredOutputClient } from "./openrouter.js";
import { buildRecommendationMessages } from "./prompts.js";

export interface RecommendationRequest {
  wardrobeSnapshot: string;
  preferences: string;
  maxRecommendations: number;
  /** Ids present in the snapshot */
  itemIds: ItemId[];
}

export interface RecommendationAdapter {
  recommend(request: RecommendationRequest, options?: AdapterCallOptions): Promise<unknown>;
}

export function createRecommendationAdapter(client: StructuredOutputClient): RecommendationAdapter {
  return {
    recommend(request, options = {}) {
      return client.generateJson(buildRecommendationMessages(request), {
        max_tokens: 2000,
        signal: options.signal,
      });
    },
  };
}
