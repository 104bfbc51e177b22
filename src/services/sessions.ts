/**
 * Session Registry
 * Each session owns one wardrobe and a stylist bound to the session's API
 * key. Sessions are created and disposed explicitly; idle ones are swept.
 */

import { randomUUID } from "crypto";
import type { ApiKeySource } from "../utils/credentials.js";
import type { Stylist } from "./stylist.js";
import { WardrobeStore } from "./wardrobeStore.js";

export interface Session {
  id: string;
  apiKeySource: ApiKeySource;
  createdAt: Date;
  lastSeenAt: Date;
  store: WardrobeStore;
  stylist: Stylist;
}

export type StylistFactory = (apiKey: string) => Stylist;

export interface SessionRegistryOptions {
  createStylist: StylistFactory;
  ttlMs: number;
  now?: () => Date;
}

/**
 * Empty a store that left its session; uploads still holding it then
 * fail the generation check instead of adding to it
 */
function retire(store: WardrobeStore): void {
  store.clear();
}

export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();
  private readonly createStylist: StylistFactory;
  private readonly ttlMs: number;
  private readonly now: () => Date;

  constructor(options: SessionRegistryOptions) {
    this.createStylist = options.createStylist;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.sessions.size;
  }

  create(apiKey: string, apiKeySource: ApiKeySource): Session {
    const now = this.now();
    const session: Session = {
      id: randomUUID(),
      apiKeySource,
      createdAt: now,
      lastSeenAt: now,
      store: new WardrobeStore(),
      stylist: this.createStylist(apiKey),
    };

    this.sessions.set(session.id, session);
    console.log(`[Sessions] Created session ${session.id} (key from ${apiKeySource})`);
    return session;
  }

  /**
   * Look up a live session and mark it as used
   */
  get(id: string): Session | undefined {
    const session = this.sessions.get(id);
    if (!session) {
      return undefined;
    }

    if (this.isExpired(session, this.now())) {
      this.dispose(id);
      return undefined;
    }

    session.lastSeenAt = this.now();
    return session;
  }

  /**
   * Swap in a different wardrobe, e.g. one rebuilt from an export document
   */
  replaceStore(id: string, store: WardrobeStore): Session | undefined {
    const session = this.sessions.get(id);
    if (!session) {
      return undefined;
    }
    const previous = session.store;
    session.store = store;
    retire(previous);
    return session;
  }

  dispose(id: string): boolean {
    const session = this.sessions.get(id);
    const removed = this.sessions.delete(id);
    if (session) {
      retire(session.store);
      console.log(`[Sessions] Disposed session ${id}`);
    }
    return removed;
  }

  /**
   * Drop sessions idle for longer than the TTL
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;

    for (const [id, session] of this.sessions.entries()) {
      if (this.isExpired(session, now)) {
        this.sessions.delete(id);
        retire(session.store);
        removed++;
      }
    }

    if (removed > 0) {
      console.log(`[Sessions] Swept ${removed} idle session(s)`);
    }
    return removed;
  }

  private isExpired(session: Session, now: Date): boolean {
    return now.getTime() - session.lastSeenAt.getTime() > this.ttlMs;
  }
}
