import type { Context, MiddlewareHandler } from "hono";
import type { AppEnv } from "./session.js";

interface RateLimitEntry {
  count: number;
  resetTime: number;
}

export interface RateLimitOptions {
  windowMs: number;
  max: number;
  keyGenerator?: (c: Context<AppEnv>) => string;
  now?: () => number;
}

export function createRateLimiter(options: RateLimitOptions): MiddlewareHandler<AppEnv> {
  const { windowMs, max, keyGenerator } = options;
  const now = options.now ?? Date.now;
  const store = new Map<string, RateLimitEntry>();
  let lastCleanup = now();

  // Expired entries are dropped at most once per window
  function cleanup(current: number) {
    if (current - lastCleanup < windowMs) {
      return;
    }
    lastCleanup = current;
    for (const [key, entry] of store.entries()) {
      if (entry.resetTime < current) {
        store.delete(key);
      }
    }
  }

  return async (c, next) => {
    const key = keyGenerator ? keyGenerator(c) : c.req.header("x-forwarded-for") ?? "anonymous";
    const current = now();
    cleanup(current);

    let entry = store.get(key);

    if (!entry || entry.resetTime < current) {
      entry = {
        count: 0,
        resetTime: current + windowMs,
      };
    }

    entry.count++;
    store.set(key, entry);

    const remaining = Math.max(0, max - entry.count);
    const resetSeconds = Math.ceil((entry.resetTime - current) / 1000);

    c.header("X-RateLimit-Limit", max.toString());
    c.header("X-RateLimit-Remaining", remaining.toString());
    c.header("X-RateLimit-Reset", resetSeconds.toString());

    if (entry.count > max) {
      return c.json(
        {
          error: "Too many requests",
          code: "rate_limited",
          retryAfter: resetSeconds,
        },
        429
      );
    }

    await next();
  };
}

/**
 * Image uploads per session (each one is a paid vision call)
 */
export function createUploadLimit(options: { windowMs: number; max: number }): MiddlewareHandler<AppEnv> {
  return createRateLimiter({
    ...options,
    keyGenerator: (c) => `item-upload:${c.get("session").id}`,
  });
}
