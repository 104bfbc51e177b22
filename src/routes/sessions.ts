import { Hono } from "hono";
import { z } from "zod";
import { InvalidRequestError } from "../errors.js";
import { createSessionMiddleware, getSession, type AppEnv } from "../middleware/session.js";
import type { SessionRegistry } from "../services/sessions.js";
import { resolveApiKey } from "../utils/credentials.js";

const createSessionSchema = z.object({
  api_key: z.string().max(500).optional(),
});

export interface SessionRouteDeps {
  registry: SessionRegistry;
  secretsDir?: string;
  env?: NodeJS.ProcessEnv;
}

export function createSessionRoutes(deps: SessionRouteDeps) {
  const { registry } = deps;
  const sessions = new Hono<AppEnv>();
  const requireSession = createSessionMiddleware(registry);

  /**
   * POST / - Start a session with an empty wardrobe
   */
  sessions.post("/", async (c) => {
    const body = await c.req.json().catch(() => ({}));
    const parsed = createSessionSchema.safeParse(body);
    if (!parsed.success) {
      throw new InvalidRequestError("api_key must be a string");
    }

    const { apiKey, source } = resolveApiKey({
      secretsDir: deps.secretsDir,
      env: deps.env,
      userProvided: parsed.data.api_key,
    });

    const session = registry.create(apiKey, source);

    return c.json(
      {
        session_id: session.id,
        api_key_source: session.apiKeySource,
        created_at: session.createdAt.toISOString(),
      },
      201
    );
  });

  // GET /current - Session details
  sessions.get("/current", requireSession, (c) => {
    const session = getSession(c);
    return c.json({
      session_id: session.id,
      api_key_source: session.apiKeySource,
      created_at: session.createdAt.toISOString(),
      item_count: session.store.size,
    });
  });

  // DELETE /current - Dispose the session and its wardrobe
  sessions.delete("/current", requireSession, (c) => {
    const session = getSession(c);
    registry.dispose(session.id);
    return c.json({ disposed: true });
  });

  return sessions;
}
