import { getItemRole } from "./itemRoles.js";

describe("getItemRole", () => {
  it.each([
    ["T-Shirt", "top"],
    ["Blouse", "top"],
    ["Jeans", "bottom"],
    ["Pleated Skirt", "bottom"],
    ["Dress", "full_body"],
    ["Shirt Dress", "full_body"],
    ["Denim Jacket", "outerwear"],
    ["Dress Shoes", "footwear"],
    ["Ankle Boots", "footwear"],
    ["Scarf", "accessory"],
  ])("classifies %s as %s", (category, role) => {
    expect(getItemRole(category)).toBe(role);
  });

  it("treats a missing category as an accessory", () => {
    expect(getItemRole("")).toBe("accessory");
    expect(getItemRole(undefined)).toBe("accessory");
  });
});
