import { Hono } from "hono";
import { logger } from "hono/logger";
import { prettyJSON } from "hono/pretty-json";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";

import { PREFERENCE_OPTIONS, ANY_PREFERENCE, DEFAULT_RECOMMENDATION_COUNT, MAX_RECOMMENDATION_COUNT } from "./constants/preferences.js";
import { isStylistError } from "./errors.js";
import type { AppEnv } from "./middleware/session.js";
import { createRecommendationRoutes } from "./routes/recommendations.js";
import { createSessionRoutes } from "./routes/sessions.js";
import { createWardrobeRoutes } from "./routes/wardrobe.js";
import { GENDER_OPTIONS } from "./schemas/wardrobe.js";
import type { SessionRegistry } from "./services/sessions.js";
import { captureError } from "./utils/sentry.js";

export const SERVICE_NAME = "Wardrobe Stylist API";
export const SERVICE_VERSION = "1.0.0";

export interface AppDeps {
  registry: SessionRegistry;
  nodeEnv?: string;
  secretsDir?: string;
  env?: NodeJS.ProcessEnv;
  uploadRateLimit?: { windowMs: number; max: number };
  /** Request logging; off in tests */
  requestLogging?: boolean;
}

export function createApp(deps: AppDeps) {
  const { registry } = deps;
  const nodeEnv = deps.nodeEnv ?? "development";
  const app = new Hono<AppEnv>();

  // Global middleware
  if (deps.requestLogging ?? true) {
    app.use("*", logger());
  }
  app.use("*", prettyJSON());
  app.use(
    "*",
    cors({
      origin: "*",
      allowMethods: ["GET", "POST", "DELETE", "OPTIONS"],
      allowHeaders: ["Content-Type", "Authorization"],
      exposeHeaders: ["Content-Disposition", "X-RateLimit-Remaining", "X-RateLimit-Reset"],
    })
  );

  // Security headers
  app.use("*", async (c, next) => {
    await next();
    c.header("X-Content-Type-Options", "nosniff");
    c.header("X-Frame-Options", "DENY");
    c.header("Referrer-Policy", "strict-origin-when-cross-origin");
    if (nodeEnv === "production") {
      c.header("Strict-Transport-Security", "max-age=31536000; includeSubDomains");
    }
  });

  // Public routes
  app.get("/", (c) => {
    return c.json({
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      status: "running",
    });
  });

  app.get("/health", (c) => {
    return c.json({ status: "healthy", timestamp: new Date().toISOString() });
  });

  const api = new Hono<AppEnv>();

  // Picker values for the client; requests accept any text
  api.get("/options", (c) => {
    return c.json({
      preferences: PREFERENCE_OPTIONS,
      defaults: {
        preference: ANY_PREFERENCE,
        count: DEFAULT_RECOMMENDATION_COUNT,
        max_count: MAX_RECOMMENDATION_COUNT,
      },
      genders: GENDER_OPTIONS,
    });
  });

  api.route(
    "/sessions",
    createSessionRoutes({ registry, secretsDir: deps.secretsDir, env: deps.env })
  );
  api.route(
    "/wardrobe",
    createWardrobeRoutes({
      registry,
      uploadRateLimit: deps.uploadRateLimit ?? { windowMs: 60 * 60 * 1000, max: 30 },
    })
  );
  api.route("/recommendations", createRecommendationRoutes({ registry }));

  app.route("/api", api);

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: "Not found" }, 404);
  });

  // Error handler
  app.onError((err, c) => {
    if (isStylistError(err)) {
      const log = err.status >= 500 ? console.error : console.warn;
      log(`[API] ${c.req.method} ${c.req.path} failed: ${err.name}: ${err.message}`);
      return c.json(err.toJSON(), err.status);
    }

    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    console.error("Unhandled error:", err);
    captureError(err, { method: c.req.method, path: c.req.path });
    return c.json(
      {
        error: "Internal server error",
        message: nodeEnv === "development" ? err.message : undefined,
      },
      500
    );
  });

  return app;
}

export type App = ReturnType<typeof createApp>;
