/**
 * Extraction adapter
 * Sends a prepared clothing photo to the vision model and returns its raw
 * structured answer. Validation against the attribute schema happens in the
 * stylist, before anything touches the wardrobe.
 */

import type { PreparedImage } from "../image.js";
import type { StructuredOutputClient } from "./openrouter.js";
import { buildExtractionMessages } from "./prompts.js";

export interface AdapterCallOptions {
  signal?: AbortSignal;
}

export interface ExtractionAdapter {
  extract(image: PreparedImage, options?: AdapterCallOptions): Promise<unknown>;
}

export function createExtractionAdapter(client: StructuredOutputClient): ExtractionAdapter {
  return {
    extract(image, options = {}) {
      return client.generateJson(buildExtractionMessages(image), {
        max_tokens: 1000,
        signal: options.signal,
      });
    },
  };
}
