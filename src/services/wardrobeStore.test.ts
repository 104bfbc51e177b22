import { SchemaValidationError } from "../errors.js";
import { createAttributes, createJeans } from "../test/fixtures.js";
import { WardrobeStore } from "./wardrobeStore.js";

const createStore = (count: number): WardrobeStore => {
  const store = new WardrobeStore();
  for (let i = 0; i < count; i++) {
    store.add(i % 2 === 0 ? createAttributes() : createJeans());
  }
  return store;
};

describe("WardrobeStore", () => {
  describe("add", () => {
    it("assigns ids 1..N in insertion order", () => {
      const store = createStore(4);

      expect(store.ids()).toEqual([1, 2, 3, 4]);
      expect(store.list().map((item) => item.id)).toEqual([1, 2, 3, 4]);
      expect(store.size).toBe(4);
      expect(store.lastAssignedId).toBe(4);
    });

    it("stores the attributes with the assigned id", () => {
      const store = new WardrobeStore();

      const id = store.add(createJeans());

      expect(store.get(id)).toEqual({ ...createJeans(), id: 1 });
    });
  });

  describe("get", () => {
    it("resolves the same item by numeric and string id", () => {
      const store = createStore(2);

      expect(store.get("2")).toEqual(store.get(2));
      expect(store.get(" 2 ")?.category).toBe("Jeans");
    });

    it("returns undefined for unknown or malformed ids", () => {
      const store = createStore(1);

      expect(store.get(5)).toBeUndefined();
      expect(store.get("abc")).toBeUndefined();
      expect(store.has(1)).toBe(true);
      expect(store.has("9")).toBe(false);
    });

    it("hands out copies that cannot change the stored item", () => {
      const store = createStore(1);

      const item = store.get(1);
      item?.color.push("Black");
      store.list()[0].occasion.push("Gym/Athletic");

      expect(store.get(1)?.color).toEqual(["White"]);
      expect(store.get(1)?.occasion).toEqual(["Casual"]);
    });
  });

  describe("clear", () => {
    it("empties the wardrobe and keeps counting ids", () => {
      const store = createStore(3);

      expect(store.clear()).toBe(3);
      expect(store.list()).toEqual([]);
      expect(store.get(1)).toBeUndefined();

      expect(store.add(createAttributes())).toBe(4);
      expect(store.ids()).toEqual([4]);
    });

    it("bumps the generation", () => {
      const store = createStore(1);

      expect(store.generation).toBe(0);
      store.clear();
      store.clear();
      expect(store.generation).toBe(2);
    });
  });

  describe("summary", () => {
    it("counts items per category", () => {
      const store = createStore(3);

      expect(store.summary()).toEqual({
        total_items: 3,
        categories: { "T-Shirt": 2, Jeans: 1 },
      });
    });

    it("is empty for an empty wardrobe", () => {
      expect(new WardrobeStore().summary()).toEqual({ total_items: 0, categories: {} });
    });
  });

  describe("export and import", () => {
    it("round-trips every item with its id", () => {
      const store = createStore(3);
      const document: unknown = JSON.parse(JSON.stringify(store.toExport()));

      const restored = WardrobeStore.fromExport(document);

      expect(restored.list()).toEqual(store.list());
      expect(restored.add(createAttributes())).toBe(4);
    });

    it("resumes the counter after the highest imported id", () => {
      const restored = WardrobeStore.fromExport([
        { ...createAttributes(), id: 5 },
        { ...createJeans(), id: 2 },
      ]);

      expect(restored.ids()).toEqual([5, 2]);
      expect(restored.lastAssignedId).toBe(5);
      expect(restored.add(createAttributes())).toBe(6);
    });

    it("rejects documents with duplicate ids", () => {
      expect(() =>
        WardrobeStore.fromExport([
          { ...createAttributes(), id: 1 },
          { ...createJeans(), id: 1 },
        ])
      ).toThrow(SchemaValidationError);
    });

    it("renders a deterministic snapshot with fields in export order", () => {
      const store = new WardrobeStore();
      store.add(createAttributes());

      expect(store.toSnapshot()).toBe(JSON.stringify(store.toExport(), null, 2));
      expect(store.toSnapshot().split("\n").slice(0, 4)).toEqual([
        "[",
        "  {",
        '    "id": 1,',
        '    "category": "T-Shirt",',
      ]);
    });
  });
});
