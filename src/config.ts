import "dotenv/config";

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    console.warn(`[Config] Ignoring invalid ${name}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

function listFromEnv(name: string, fallback: string[]): string[] {
  const raw = process.env[name];
  if (raw === undefined) {
    return fallback;
  }
  return raw
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
}

export interface AiConfig {
  apiUrl: string;
  model: string;
  fallbackModels: string[];
  timeoutMs: number;
  maxRetries: number;
  retryBackoffMs: number;
  /** Sent as HTTP-Referer for OpenRouter's app attribution */
  appUrl: string;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  secretsDir: string;
  ai: AiConfig;
  imageMaxDimension: number;
  sessionTtlMs: number;
  uploadRateLimit: { windowMs: number; max: number };
  sentryDsn?: string;
}

export function loadConfig(): AppConfig {
  return {
    port: intFromEnv("PORT", 3000),
    nodeEnv: process.env.NODE_ENV ?? "development",
    secretsDir: process.env.SECRETS_DIR ?? "/run/secrets",
    ai: {
      apiUrl: "https://openrouter.ai/api/v1/chat/completions",
      model: process.env.OPENROUTER_MODEL || "google/gemini-2.0-flash-001",
      fallbackModels: listFromEnv("OPENROUTER_FALLBACK_MODELS", [
        "google/gemini-2.0-flash-lite-001",
      ]),
      timeoutMs: intFromEnv("AI_TIMEOUT_MS", 60000),
      maxRetries: Math.max(1, intFromEnv("AI_MAX_RETRIES", 3)),
      retryBackoffMs: intFromEnv("AI_RETRY_BACKOFF_MS", 500),
      appUrl: process.env.APP_URL || "http://localhost:3000",
    },
    imageMaxDimension: Math.max(1, intFromEnv("IMAGE_MAX_DIMENSION", 800)),
    sessionTtlMs: intFromEnv("SESSION_TTL_MS", 2 * 60 * 60 * 1000),
    uploadRateLimit: {
      windowMs: 60 * 60 * 1000, // 1 hour
      max: Math.max(1, intFromEnv("UPLOAD_RATE_LIMIT", 30)),
    },
    sentryDsn: process.env.SENTRY_DSN || undefined,
  };
}
