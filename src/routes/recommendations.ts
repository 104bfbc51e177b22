import { Hono } from "hono";
import { InvalidRequestError } from "../errors.js";
import { createSessionMiddleware, getSession, type AppEnv } from "../middleware/session.js";
import { preferencesSchema } from "../schemas/preferences.js";
import { formatIssues, type ClothingItem } from "../schemas/wardrobe.js";
import type { ValidatedRecommendation } from "../services/recommendationValidator.js";
import type { SessionRegistry } from "../services/sessions.js";
import { getItemRole } from "../utils/itemRoles.js";

/**
 * Shape the validated recommendation for display
 */
function toResponse(recommendation: ValidatedRecommendation) {
  return {
    recommended_items: recommendation.recommended_items,
    items: recommendation.items.map((item: ClothingItem) => ({
      ...item,
      role: getItemRole(item.category),
    })),
    reasoning: recommendation.reasoning,
    style_tips: recommendation.style_tips,
    dropped_item_ids: recommendation.dropped_item_ids,
  };
}

export function createRecommendationRoutes(deps: { registry: SessionRegistry }) {
  const recommendations = new Hono<AppEnv>();

  recommendations.use("*", createSessionMiddleware(deps.registry));

  /**
   * POST / - Recommend an outfit from the session's wardrobe
   */
  recommendations.post("/", async (c) => {
    const { store, stylist } = getSession(c);

    const body = await c.req.json().catch(() => ({}));
    const parsed = preferencesSchema.safeParse(body);
    if (!parsed.success) {
      throw new InvalidRequestError(`Invalid preferences: ${formatIssues(parsed.error).join("; ")}`);
    }

    const recommendation = await stylist.recommendOutfit(store, parsed.data, {
      signal: c.req.raw.signal,
    });

    return c.json({ recommendation: toResponse(recommendation) });
  });

  return recommendations;
}
