import { z } from "zod";
import {
  ANY_PREFERENCE,
  DEFAULT_RECOMMENDATION_COUNT,
  MAX_RECOMMENDATION_COUNT,
} from "../constants/preferences.js";

const preferenceText = z
  .string()
  .trim()
  .max(200)
  .optional()
  .transform((value) => value || ANY_PREFERENCE);

export const preferencesSchema = z.object({
  occasion: preferenceText,
  season: preferenceText,
  time_of_day: preferenceText,
  style: preferenceText,
  notes: z.string().trim().max(1000).optional().default(""),
  count: z.coerce
    .number()
    .int()
    .min(1)
    .max(MAX_RECOMMENDATION_COUNT)
    .optional()
    .default(DEFAULT_RECOMMENDATION_COUNT),
});

export type PreferencesInput = z.input<typeof preferencesSchema>;
export type Preferences = z.output<typeof preferencesSchema>;

/**
 * Render the preference bundle as the plain text sent with the request
 */
export function formatPreferences(preferences: Preferences): string {
  return [
    `Occasion: ${preferences.occasion}`,
    `Season: ${preferences.season}`,
    `Time of Day: ${preferences.time_of_day}`,
    `Style Preference: ${preferences.style}`,
    `Additional Notes: ${preferences.notes}`,
  ].join("\n");
}
