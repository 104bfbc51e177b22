/**
 * Request contracts for the structured-output service
 */

import type { PreparedImage } from "../image.js";
import type { OpenRouterMessage } from "./openrouter.js";

export const EXTRACTION_SYSTEM_PROMPT = `You are an expert fashion analyst. Analyze the single clothing item in the image and describe its properties.
Be specific. If an attribute is not clearly visible, make a reasonable inference from what you can see.
Output ONLY valid JSON with this exact schema:
{
  "category": "string (e.g., 'T-Shirt', 'Dress', 'Pants', 'Shorts')",
  "description": "string (a detailed description of the item)",
  "color": ["string (every color present, most prominent first)"],
  "gender": "Unisex|Male|Female",
  "fabric": "string (e.g., 'Cotton', 'Denim', 'Wool blend')",
  "pattern": "string (e.g., 'Solid', 'Striped', 'Checked', 'Floral')",
  "fit": "string (e.g., 'Regular Fit', 'Slim Fit', 'Loose Fit')",
  "sleeve_length": "string (e.g., 'Short', 'Long', '3/4', 'Sleeveless', 'N/A')",
  "neck_type": "string (e.g., 'Round', 'V-Neck', 'Collar', 'N/A')",
  "occasion": ["string (every suitable occasion)"],
  "season": ["string (every suitable season)"],
  "features": ["string (notable features such as pockets, buttons, hood)"]
}

Rules:
- color, occasion and season MUST contain at least one entry
- features may be an empty array
- Output ONLY the JSON object, no markdown, no explanation`;

export const EXTRACTION_USER_PROMPT = "Analyze this clothing item and extract its properties.";

export function buildExtractionMessages(image: PreparedImage): OpenRouterMessage[] {
  return [
    { role: "system", content: EXTRACTION_SYSTEM_PROMPT },
    {
      role: "user",
      content: [
        { type: "text", text: EXTRACTION_USER_PROMPT },
        { type: "image_url", image_url: { url: image.dataUri } },
      ],
    },
  ];
}

export interface RecommendationPromptInput {
  /** Deterministic text form of the whole wardrobe */
  wardrobeSnapshot: string;
  /** Preference bundle rendered as plain text */
  preferences: string;
  maxRecommendations: number;
  itemIds: number[];
}

export function buildRecommendationSystemPrompt(input: RecommendationPromptInput): string {
  return `You are an expert fashion stylist. Based on the user's preferences and the items in their wardrobe, recommend a complete outfit that matches their needs.
Consider color coordination, style compatibility, occasion appropriateness and seasonal suitability.

User's Wardrobe:
${input.wardrobeSnapshot}

Guidelines:
1. Recommend complete outfits (include both top and bottom wear when applicable)
2. Consider color harmony and style coherence
3. Match the occasion and season specified by the user
4. Provide practical styling advice
5. Consider at most ${input.maxRecommendations} outfit options and return the best one
6. Only use item IDs that exist in the wardrobe above (valid IDs: ${input.itemIds.join(", ")})

Output ONLY valid JSON with this exact schema:
{
  "recommended_items": ["item id from the wardrobe"],
  "reasoning": "string (why this outfit works)",
  "style_tips": ["string"]
}`;
}

export function buildRecommendationMessages(input: RecommendationPromptInput): OpenRouterMessage[] {
  return [
    { role: "system", content: buildRecommendationSystemPrompt(input) },
    { role: "user", content: `User preferences:\n${input.preferences}` },
  ];
}
