/**
 * Preference options offered to the client
 * Requests accept free text; these lists are suggestions for pickers.
 */

export const PREFERENCE_OPTIONS = {
  occasion: [
    "Casual",
    "Work/Professional",
    "Party",
    "Date Night",
    "Beach/Pool",
    "Gym/Athletic",
    "Formal Event",
    "Travel",
  ],
  season: ["Spring", "Summer", "Fall", "Winter", "Any"],
  time_of_day: ["Morning", "Afternoon", "Evening", "Night", "Any"],
  style: ["Comfortable", "Stylish", "Professional", "Trendy", "Classic", "Minimalist", "Bold"],
} as const;

export type PreferenceField = keyof typeof PREFERENCE_OPTIONS;

// Used when a field is left out of a request
export const ANY_PREFERENCE = "Any";

export const DEFAULT_RECOMMENDATION_COUNT = 3;
export const MAX_RECOMMENDATION_COUNT = 5;
