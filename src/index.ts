import { serve } from "@hono/node-server";

import { createApp, SERVICE_NAME } from "./app.js";
import { loadConfig } from "./config.js";
import {
  createExtractionAdapter,
  createRecommendationAdapter,
  OpenRouterClient,
} from "./services/ai/index.js";
import { SessionRegistry } from "./services/sessions.js";
import { Stylist } from "./services/stylist.js";
import { initSentry } from "./utils/sentry.js";

const config = loadConfig();

initSentry(config.sentryDsn, config.nodeEnv);

const registry = new SessionRegistry({
  ttlMs: config.sessionTtlMs,
  createStylist: (apiKey) => {
    const client = new OpenRouterClient({ apiKey, ...config.ai });
    return new Stylist(
      {
        extraction: createExtractionAdapter(client),
        recommendation: createRecommendationAdapter(client),
      },
      { imageMaxDimension: config.imageMaxDimension }
    );
  },
});

// Drop idle sessions every few minutes
const sweepTimer = setInterval(() => registry.sweep(), 5 * 60 * 1000);
sweepTimer.unref();

const app = createApp({
  registry,
  nodeEnv: config.nodeEnv,
  secretsDir: config.secretsDir,
  uploadRateLimit: config.uploadRateLimit,
});

console.log(`Starting ${SERVICE_NAME} on port ${config.port}...`);

serve({
  fetch: app.fetch,
  port: config.port,
});

console.log(`${SERVICE_NAME} running at http://localhost:${config.port}`);
