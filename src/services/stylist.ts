/**
 * Stylist Service
 * Orchestrates the two operations the client calls into:
 * - analyze a clothing photo and add the item to the wardrobe
 * - recommend an outfit from the wardrobe for a set of preferences
 */

import {
  PreconditionError,
  SchemaValidationError,
  TransportError,
  type AiOperation,
} from "../errors.js";
import { formatPreferences, type Preferences } from "../schemas/preferences.js";
import {
  parseClothingAttributes,
  parseOutfitRecommendation,
  type ClothingItem,
} from "../schemas/wardrobe.js";
import { addBreadcrumb } from "../utils/sentry.js";
import type { ExtractionAdapter } from "./ai/extraction.js";
import type { RecommendationAdapter } from "./ai/recommendation.js";
import { prepareImage, DEFAULT_MAX_DIMENSION } from "./image.js";
import {
  validateRecommendation,
  type ValidatedRecommendation,
} from "./recommendationValidator.js";
import type { WardrobeStore } from "./wardrobeStore.js";

export interface StylistAdapters {
  extraction: ExtractionAdapter;
  recommendation: RecommendationAdapter;
}

export interface StylistOptions {
  imageMaxDimension?: number;
}

export interface CallOptions {
  /** Aborted when the client goes away; nothing is stored after that */
  signal?: AbortSignal;
}

/**
 * Attribute adapter failures to the operation that made the call
 */
async function attributed<T>(operation: AiOperation, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (err) {
    if (err instanceof TransportError || err instanceof SchemaValidationError) {
      throw err.during(operation);
    }
    throw err;
  }
}

function ensureNotAbandoned(signal: AbortSignal | undefined, operation: AiOperation): void {
  if (signal?.aborted) {
    throw new TransportError("Request abandoned by caller", { operation });
  }
}

export class Stylist {
  private readonly imageMaxDimension: number;

  constructor(
    private readonly adapters: StylistAdapters,
    options: StylistOptions = {}
  ) {
    this.imageMaxDimension = options.imageMaxDimension ?? DEFAULT_MAX_DIMENSION;
  }

  /**
   * Analyze a clothing photo and insert the validated item.
   * The wardrobe is only touched once the extraction fully validated.
   */
  async addItemFromImage(
    store: WardrobeStore,
    image: Uint8Array,
    options: CallOptions = {}
  ): Promise<ClothingItem> {
    const { signal } = options;
    const generation = store.generation;

    const prepared = await prepareImage(image, { maxDimension: this.imageMaxDimension });
    console.log(
      `[Stylist] Analyzing ${prepared.mediaType} image (${prepared.width}x${prepared.height}, ${prepared.bytes} bytes)`
    );
    addBreadcrumb("stylist", "Extraction requested", { mediaType: prepared.mediaType });

    const attributes = await attributed("extraction", async () =>
      parseClothingAttributes(await this.adapters.extraction.extract(prepared, { signal }))
    );

    ensureNotAbandoned(signal, "extraction");

    if (store.generation !== generation) {
      throw new PreconditionError("Wardrobe was cleared while the image was being analyzed");
    }

    const id = store.add(attributes);
    const item = store.get(id);
    if (!item) {
      throw new Error(`Item ${id} missing right after insertion`);
    }

    console.log(`[Stylist] Added item #${id} (${item.category})`);
    return item;
  }

  /**
   * Recommend an outfit from the current wardrobe
   */
  async recommendOutfit(
    store: WardrobeStore,
    preferences: Preferences,
    options: CallOptions = {}
  ): Promise<ValidatedRecommendation> {
    const { signal } = options;

    if (store.size === 0) {
      throw new PreconditionError("Wardrobe is empty; add some clothing items first");
    }

    addBreadcrumb("stylist", "Recommendation requested", {
      items: store.size,
      occasion: preferences.occasion,
      season: preferences.season,
    });

    const recommendation = await attributed("recommendation", async () =>
      parseOutfitRecommendation(
        await this.adapters.recommendation.recommend(
          {
            wardrobeSnapshot: store.toSnapshot(),
            preferences: formatPreferences(preferences),
            maxRecommendations: preferences.count,
            itemIds: store.ids(),
          },
          { signal }
        )
      )
    );

    ensureNotAbandoned(signal, "recommendation");

    // Resolved against the wardrobe as it is now, not as it was sent
    const validated = validateRecommendation(recommendation, store);
    console.log(
      `[Stylist] Recommended ${validated.items.length} item(s): ${validated.recommended_items.join(", ")}`
    );
    return validated;
  }
}
