import { createAttributes } from "../test/fixtures.js";
import { SessionRegistry } from "./sessions.js";
import { Stylist } from "./stylist.js";
import { WardrobeStore } from "./wardrobeStore.js";

const TTL_MS = 60 * 1000;

describe("SessionRegistry", () => {
  let clock: number;
  let createStylist: jest.Mock<Stylist, [string]>;
  let registry: SessionRegistry;

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    clock = Date.UTC(2024, 0, 1);
    createStylist = jest.fn(
      (_apiKey: string) =>
        new Stylist({
          extraction: { extract: async () => createAttributes() },
          recommendation: { recommend: async () => ({}) },
        })
    );
    registry = new SessionRegistry({
      createStylist,
      ttlMs: TTL_MS,
      now: () => new Date(clock),
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("creates sessions with their own empty wardrobe", () => {
    const first = registry.create("test-key", "environment");
    const second = registry.create("test-key", "user_input");

    expect(first.id).not.toBe(second.id);
    expect(first.store).not.toBe(second.store);
    expect(first.store.size).toBe(0);
    expect(second.apiKeySource).toBe("user_input");
    expect(createStylist.mock.calls).toEqual([["test-key"], ["test-key"]]);
    expect(registry.size).toBe(2);
  });

  it("keeps a session alive while it is used", () => {
    const session = registry.create("test-key", "environment");

    clock += TTL_MS - 1;
    expect(registry.get(session.id)).toBe(session);
    clock += TTL_MS - 1;
    expect(registry.get(session.id)).toBe(session);
  });

  it("expires a session idle past the TTL", () => {
    const session = registry.create("test-key", "environment");

    clock += TTL_MS + 1;

    expect(registry.get(session.id)).toBeUndefined();
    expect(registry.size).toBe(0);
  });

  it("sweeps idle sessions only", () => {
    const idle = registry.create("test-key", "environment");
    clock += TTL_MS / 2;
    const active = registry.create("test-key", "environment");
    clock += TTL_MS / 2 + 1;

    expect(registry.sweep()).toBe(1);
    expect(registry.get(idle.id)).toBeUndefined();
    expect(registry.get(active.id)).toBe(active);
  });

  it("replaces a session's wardrobe", () => {
    const session = registry.create("test-key", "environment");
    const store = new WardrobeStore();
    store.add(createAttributes());

    registry.replaceStore(session.id, store);

    expect(registry.get(session.id)?.store.size).toBe(1);
    expect(registry.replaceStore("missing", store)).toBeUndefined();
  });

  it("empties the replaced wardrobe so pending uploads see the change", () => {
    const session = registry.create("test-key", "environment");
    const previous = session.store;
    previous.add(createAttributes());

    registry.replaceStore(session.id, new WardrobeStore());

    expect(previous.size).toBe(0);
    expect(previous.generation).toBe(1);
  });

  it("empties the wardrobe of a disposed or swept session", () => {
    const disposed = registry.create("test-key", "environment");
    disposed.store.add(createAttributes());
    const idle = registry.create("test-key", "environment");
    idle.store.add(createAttributes());

    registry.dispose(disposed.id);
    clock += TTL_MS + 1;
    registry.sweep();

    expect(disposed.store.generation).toBe(1);
    expect(idle.store.generation).toBe(1);
    expect(idle.store.size).toBe(0);
  });

  it("disposes a session", () => {
    const session = registry.create("test-key", "environment");

    expect(registry.dispose(session.id)).toBe(true);
    expect(registry.dispose(session.id)).toBe(false);
    expect(registry.get(session.id)).toBeUndefined();
  });
});
