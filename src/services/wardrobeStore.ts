/**
 * Wardrobe Store
 * Ordered, id-indexed collection of clothing items for one session.
 *
 * Ids are assigned sequentially from 1 and never reused: clearing in place
 * keeps the counter, so a fresh counter only ever comes with a fresh store.
 * Stored items are never handed out directly; callers get copies.
 */

import {
  normalizeItemId,
  orderItemFields,
  parseWardrobeDocument,
  type ClothingAttributes,
  type ClothingItem,
  type ItemId,
} from "../schemas/wardrobe.js";

export interface WardrobeSummary {
  total_items: number;
  categories: Record<string, number>;
}

export class WardrobeStore {
  private readonly items: ClothingItem[] = [];
  private readonly byId = new Map<ItemId, ClothingItem>();
  private counter = 0;
  private clears = 0;

  /**
   * Rebuild a store from an export document.
   * Items keep their ids and order; the counter resumes after the highest id.
   */
  static fromExport(document: unknown): WardrobeStore {
    const store = new WardrobeStore();
    for (const item of parseWardrobeDocument(document)) {
      store.insert(item);
      store.counter = Math.max(store.counter, item.id);
    }
    return store;
  }

  get size(): number {
    return this.items.length;
  }

  /** Number of ids handed out so far */
  get lastAssignedId(): number {
    return this.counter;
  }

  /** Changes every time the store is cleared */
  get generation(): number {
    return this.clears;
  }

  add(attributes: ClothingAttributes): ItemId {
    const id = this.counter + 1;
    this.insert({ ...attributes, id });
    this.counter = id;
    return id;
  }

  get(id: ItemId | string): ClothingItem | undefined {
    const key = normalizeItemId(id);
    const item = key === null ? undefined : this.byId.get(key);
    return item ? orderItemFields(item) : undefined;
  }

  has(id: ItemId | string): boolean {
    const key = normalizeItemId(id);
    return key !== null && this.byId.has(key);
  }

  list(): ClothingItem[] {
    return this.items.map(orderItemFields);
  }

  ids(): ItemId[] {
    return this.items.map((item) => item.id);
  }

  clear(): number {
    const removed = this.items.length;
    this.items.length = 0;
    this.byId.clear();
    this.clears++;
    return removed;
  }

  summary(): WardrobeSummary {
    const categories: Record<string, number> = {};
    for (const item of this.items) {
      categories[item.category] = (categories[item.category] ?? 0) + 1;
    }
    return { total_items: this.items.length, categories };
  }

  /**
   * JSON export document: every item with its id, fields in a stable order
   */
  toExport(): ClothingItem[] {
    return this.list();
  }

  /**
   * Deterministic text form of the wardrobe for the recommendation request
   */
  toSnapshot(): string {
    return JSON.stringify(this.toExport(), null, 2);
  }

  private insert(item: ClothingItem): void {
    const stored = orderItemFields(item);
    this.items.push(stored);
    this.byId.set(stored.id, stored);
  }
}
