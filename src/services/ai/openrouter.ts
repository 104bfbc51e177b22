/**
 * OpenRouter API Client
 * Structured-output calls to LLMs via OpenRouter with retry and fallback support
 */

import { z } from "zod";
import {
  ConfigurationError,
  SchemaValidationError,
  TransportError,
} from "../../errors.js";

const DEFAULT_API_URL = "https://openrouter.ai/api/v1/chat/completions";
const DEFAULT_MODEL = "google/gemini-2.0-flash-001";
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_TIMEOUT_MS = 60000;
const DEFAULT_RETRY_BACKOFF_MS = 500;
const DEFAULT_APP_URL = "http://localhost:3000";

export type ContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

export interface OpenRouterMessage {
  role: "user" | "assistant" | "system";
  content: string | ContentPart[];
}

export interface CompletionOptions {
  max_tokens?: number;
  temperature?: number;
  /** Aborts the call when the caller gives up on it */
  signal?: AbortSignal;
}

export interface OpenRouterRequest extends CompletionOptions {
  model?: string;
  messages: OpenRouterMessage[];
}

/**
 * Anything that turns chat messages into a parsed JSON value
 */
export interface StructuredOutputClient {
  generateJson(messages: OpenRouterMessage[], options?: CompletionOptions): Promise<unknown>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface OpenRouterClientOptions {
  apiKey: string;
  apiUrl?: string;
  model?: string;
  fallbackModels?: string[];
  timeoutMs?: number;
  maxRetries?: number;
  retryBackoffMs?: number;
  appUrl?: string;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

const openRouterResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
        }),
      })
    )
    .min(1),
});

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function classifyHttpError(status: number, body: string): Error {
  const detail = `OpenRouter API error ${status}: ${body.slice(0, 300)}`;

  if (status === 401 || status === 403) {
    return new ConfigurationError("API key was rejected by OpenRouter", new Error(detail));
  }

  // Rate limits, request timeouts and server errors are worth another try
  const isRetryable = status === 408 || status === 429 || status >= 500;
  return new TransportError(detail, { isRetryable });
}

export class OpenRouterClient implements StructuredOutputClient {
  private readonly apiKey: string;
  private readonly apiUrl: string;
  private readonly models: string[];
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBackoffMs: number;
  private readonly appUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: OpenRouterClientOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError("OPENROUTER_API_KEY not configured");
    }

    this.apiKey = options.apiKey;
    this.apiUrl = options.apiUrl ?? DEFAULT_API_URL;
    this.models = [options.model ?? DEFAULT_MODEL, ...(options.fallbackModels ?? [])];
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.retryBackoffMs = options.retryBackoffMs ?? DEFAULT_RETRY_BACKOFF_MS;
    this.appUrl = options.appUrl ?? DEFAULT_APP_URL;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Call OpenRouter once with a specific model
   */
  async complete(request: OpenRouterRequest): Promise<string> {
    const { signal } = request;
    const model = request.model ?? this.models[0];

    if (signal?.aborted) {
      throw new TransportError("Request abandoned by caller");
    }

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    let data: unknown;
    try {
      const response = await this.fetchImpl(this.apiUrl, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
          "HTTP-Referer": this.appUrl,
          "X-Title": "Wardrobe Stylist",
        },
        body: JSON.stringify({
          model,
          messages: request.messages,
          max_tokens: request.max_tokens ?? 2000,
          temperature: request.temperature ?? 0.1,
          response_format: { type: "json_object" },
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw classifyHttpError(response.status, errorText);
      }

      data = await response.json();
    } catch (err) {
      if (err instanceof ConfigurationError || err instanceof TransportError) {
        throw err;
      }
      if (timedOut) {
        throw new TransportError(`OpenRouter request timed out after ${this.timeoutMs}ms`, {
          isRetryable: true,
          timedOut: true,
          originalError: err,
        });
      }
      if (signal?.aborted) {
        throw new TransportError("Request abandoned by caller", { originalError: err });
      }
      if (err instanceof SyntaxError) {
        throw new TransportError("OpenRouter returned an unreadable response body", {
          originalError: err,
        });
      }

      const errorMessage = err instanceof Error ? err.message : "Unknown error";
      throw new TransportError(`OpenRouter request failed: ${errorMessage}`, {
        isRetryable: true,
        originalError: err,
      });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }

    const parsed = openRouterResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new SchemaValidationError("OpenRouter response contained no choices");
    }

    const content = parsed.data.choices[0].message.content;
    if (!content || !content.trim()) {
      throw new SchemaValidationError("OpenRouter returned empty content");
    }

    return content;
  }

  /**
   * Call OpenRouter with retries for transient failures and automatic
   * fallback to alternative models
   */
  async completeWithFallback(
    messages: OpenRouterMessage[],
    options: CompletionOptions = {}
  ): Promise<string> {
    let lastError: TransportError | undefined;

    for (const model of this.models) {
      for (let attempt = 0; attempt < this.maxRetries; attempt++) {
        try {
          console.log(`[OpenRouter] Trying ${model} (attempt ${attempt + 1}/${this.maxRetries})`);

          const response = await this.complete({ ...options, model, messages });

          console.log(`[OpenRouter] Success with ${model}`);
          return response;
        } catch (err) {
          // Only transient transport failures are retried
          if (!(err instanceof TransportError) || !err.isRetryable) {
            throw err;
          }

          lastError = err;
          console.warn(`[OpenRouter] ${model} attempt ${attempt + 1} failed: ${err.message}`);

          if (err.timedOut) {
            console.warn(`[OpenRouter] ${model} timed out, trying next model`);
            break;
          }

          if (attempt < this.maxRetries - 1) {
            await this.sleep(this.retryBackoffMs * 2 ** attempt);
          }
        }
      }
    }

    throw new TransportError(
      `All OpenRouter models failed${lastError ? `: ${lastError.message}` : ""}`,
      {
        isRetryable: true,
        timedOut: lastError?.timedOut,
        originalError: lastError,
      }
    );
  }

  async generateJson(
    messages: OpenRouterMessage[],
    options: CompletionOptions = {}
  ): Promise<unknown> {
    const content = await this.completeWithFallback(messages, options);

    try {
      return parseJsonFromLLMResponse(content);
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : "Unknown error";
      throw new SchemaValidationError("Model output was not valid JSON", [errorMessage], {
        originalError: err,
      });
    }
  }
}

/**
 * Parse JSON from a potentially messy LLM response
 * Handles markdown code blocks and extra text
 */
export function parseJsonFromLLMResponse(content: string): unknown {
  // Try to extract JSON from markdown code blocks
  const jsonMatch = content.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (jsonMatch) {
    return JSON.parse(jsonMatch[1].trim());
  }

  // Try direct parse if it looks like JSON
  const trimmed = content.trim();
  if (trimmed.startsWith("{") || trimmed.startsWith("[")) {
    return JSON.parse(trimmed);
  }

  // Try to find JSON object in the response
  const objectMatch = content.match(/\{[\s\S]*\}/);
  if (objectMatch) {
    return JSON.parse(objectMatch[0]);
  }

  throw new Error("Could not parse JSON from LLM response");
}
