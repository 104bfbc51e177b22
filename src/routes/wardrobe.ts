import { Hono, type Context } from "hono";
import { InvalidRequestError, NotFoundError } from "../errors.js";
import { createUploadLimit } from "../middleware/rateLimit.js";
import { createSessionMiddleware, getSession, type AppEnv } from "../middleware/session.js";
import type { SessionRegistry } from "../services/sessions.js";
import { WardrobeStore } from "../services/wardrobeStore.js";

export const EXPORT_FILE_NAME = "my_wardrobe.json";

export interface WardrobeRouteDeps {
  registry: SessionRegistry;
  uploadRateLimit: { windowMs: number; max: number };
}

/**
 * Read the uploaded photo from a multipart "image" field or a raw image body
 */
async function readImageUpload(c: Context<AppEnv>): Promise<Uint8Array> {
  const contentType = (c.req.header("Content-Type") ?? "").toLowerCase();

  if (contentType.startsWith("multipart/form-data")) {
    const body = await c.req.parseBody();
    const file = body["image"];
    if (!file || typeof file === "string" || Array.isArray(file)) {
      throw new InvalidRequestError('Multipart field "image" must contain a file');
    }
    return new Uint8Array(await file.arrayBuffer());
  }

  if (contentType.startsWith("image/") || contentType.startsWith("application/octet-stream")) {
    return new Uint8Array(await c.req.arrayBuffer());
  }

  throw new InvalidRequestError(
    'Send the image as multipart/form-data (field "image") or as a raw image/* body'
  );
}

export function createWardrobeRoutes(deps: WardrobeRouteDeps) {
  const { registry } = deps;
  const wardrobe = new Hono<AppEnv>();
  const uploadLimit = createUploadLimit(deps.uploadRateLimit);

  wardrobe.use("*", createSessionMiddleware(registry));

  // GET / - All items in insertion order
  wardrobe.get("/", (c) => {
    const { store } = getSession(c);
    return c.json({ items: store.list() });
  });

  // GET /summary - Category counts for the stats panel
  wardrobe.get("/summary", (c) => {
    const { store } = getSession(c);
    return c.json(store.summary());
  });

  // GET /export - Download the wardrobe as a JSON document
  wardrobe.get("/export", (c) => {
    const { store } = getSession(c);
    return c.body(JSON.stringify(store.toExport(), null, 2), 200, {
      "Content-Type": "application/json; charset=UTF-8",
      "Content-Disposition": `attachment; filename="${EXPORT_FILE_NAME}"`,
    });
  });

  /**
   * POST /import - Replace the wardrobe with one rebuilt from an export document
   * Ids are kept as exported; new items continue after the highest one
   */
  wardrobe.post("/import", async (c) => {
    const session = getSession(c);
    const document = await c.req.json().catch(() => {
      throw new InvalidRequestError("Request body must be a JSON wardrobe document");
    });

    const store = WardrobeStore.fromExport(document);
    registry.replaceStore(session.id, store);

    console.log(`[Wardrobe] Imported ${store.size} item(s) into session ${session.id}`);
    return c.json({ imported: store.size, items: store.list() });
  });

  // GET /items/:id - Single item
  wardrobe.get("/items/:id", (c) => {
    const { store } = getSession(c);
    const itemId = c.req.param("id");

    const item = store.get(itemId);
    if (!item) {
      throw new NotFoundError(`Item ${itemId} not found`);
    }

    return c.json({ item });
  });

  /**
   * POST /items - Analyze a clothing photo and add it to the wardrobe
   */
  wardrobe.post("/items", uploadLimit, async (c) => {
    const { store, stylist } = getSession(c);
    const image = await readImageUpload(c);

    const item = await stylist.addItemFromImage(store, image, { signal: c.req.raw.signal });

    return c.json({ item }, 201);
  });

  // DELETE / - Clear the wardrobe in place (ids keep counting up)
  wardrobe.delete("/", (c) => {
    const { store } = getSession(c);
    const cleared = store.clear();
    console.log(`[Wardrobe] Cleared ${cleared} item(s)`);
    return c.json({ cleared });
  });

  return wardrobe;
}
