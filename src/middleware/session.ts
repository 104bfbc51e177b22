import type { Context, MiddlewareHandler } from "hono";
import type { Session, SessionRegistry } from "../services/sessions.js";

export type AppEnv = {
  Variables: {
    session: Session;
  };
};

/**
 * Resolve the session named by the bearer token
 */
export function createSessionMiddleware(registry: SessionRegistry): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const authHeader = c.req.header("Authorization");

    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      return c.json({ error: "Missing or invalid Authorization header", code: "unauthorized" }, 401);
    }

    const token = authHeader.slice(7).trim();
    const session = registry.get(token);

    if (!session) {
      return c.json({ error: "Unknown or expired session", code: "unauthorized" }, 401);
    }

    c.set("session", session);

    await next();
  };
}

export function getSession(c: Context<AppEnv>): Session {
  return c.get("session");
}
