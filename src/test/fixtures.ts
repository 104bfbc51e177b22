import sharp from "sharp";
import type { ClothingAttributes } from "../schemas/wardrobe.js";

export const createAttributes = (overrides: Partial<ClothingAttributes> = {}): ClothingAttributes => ({
  category: "T-Shirt",
  description: "Plain white crew-neck tee",
  color: ["White"],
  gender: "Unisex",
  fabric: "Cotton",
  pattern: "Solid",
  fit: "Regular Fit",
  sleeve_length: "Short",
  neck_type: "Round",
  occasion: ["Casual"],
  season: ["Summer"],
  features: [],
  ...overrides,
});

export const createJeans = (): ClothingAttributes =>
  createAttributes({
    category: "Jeans",
    description: "Dark wash straight-leg jeans",
    color: ["Blue"],
    fabric: "Denim",
    fit: "Straight Fit",
    sleeve_length: "N/A",
    neck_type: "N/A",
    season: ["Spring", "Fall"],
    features: ["Pockets"],
  });

/**
 * Solid-color test image of the given size
 */
export const createImage = (
  width: number,
  height: number,
  format: "png" | "jpeg" | "webp" = "png"
): Promise<Buffer> =>
  sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 40, b: 40 } },
  })
    .toFormat(format)
    .toBuffer();
