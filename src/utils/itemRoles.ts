/**
 * Outfit role of an item, derived from its free-form category
 */

export type ItemRole = "top" | "bottom" | "full_body" | "footwear" | "outerwear" | "accessory";

const ROLE_KEYWORDS: [ItemRole, string[]][] = [
  ["full_body", ["dress", "jumpsuit", "romper", "overalls", "gown", "saree", "sari"]],
  ["outerwear", ["jacket", "coat", "blazer", "vest", "outerwear", "parka", "windbreaker", "gilet"]],
  ["footwear", ["sneakers", "shoes", "boots", "sandals", "loafers", "heels", "footwear", "flats", "oxfords", "trainers"]],
  ["bottom", ["jeans", "pants", "trousers", "shorts", "skirt", "chinos", "joggers", "bottom", "slacks", "leggings"]],
  ["top", ["t-shirt", "tshirt", "shirt", "blouse", "sweater", "hoodie", "tank", "polo", "top", "tee", "henley", "cardigan", "sweatshirt", "kurta"]],
];

export function getItemRole(category: string | null | undefined): ItemRole {
  const cat = (category || "").toLowerCase().trim();
  if (!cat) {
    return "accessory";
  }

  // Whole label first, then the head noun ("Dress Shoes" are shoes), then any word
  const words = cat.split(/[\s/,&]+/).filter(Boolean);
  const candidates = [cat, words[words.length - 1], ...words];

  for (const candidate of candidates) {
    for (const [role, keywords] of ROLE_KEYWORDS) {
      if (keywords.includes(candidate)) {
        return role;
      }
    }
  }

  // Default to accessory
  return "accessory";
}
