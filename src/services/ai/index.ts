export { OpenRouterClient, parseJsonFromLLMResponse } from "./openrouter.js";
export type {
  OpenRouterMessage,
  OpenRouterClientOptions,
  FetchLike,
  StructuredOutputClient,
  CompletionOptions,
} from "./openrouter.js";
export { createExtractionAdapter } from "./extraction.js";
export type { ExtractionAdapter, AdapterCallOptions } from "./extraction.js";
export { createRecommendationAdapter } from "./recommendation.js";
export type { RecommendationAdapter, RecommendationRequest } from "./recommendation.js";
