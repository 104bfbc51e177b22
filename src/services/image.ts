/**
 * Image preparation
 * Downscales an uploaded clothing photo and encodes it as a data URI for the
 * vision model. Pixel data is never inspected beyond what resizing needs.
 */

import sharp from "sharp";
import { InvalidRequestError } from "../errors.js";

export const DEFAULT_MAX_DIMENSION = 800;

const MEDIA_TYPES = {
  png: "image/png",
  jpeg: "image/jpeg",
  webp: "image/webp",
} as const;

export type ImageFormat = keyof typeof MEDIA_TYPES;
export type ImageMediaType = (typeof MEDIA_TYPES)[ImageFormat];

export interface PreparedImage {
  mediaType: ImageMediaType;
  base64: string;
  dataUri: string;
  width: number;
  height: number;
  bytes: number;
}

function isSupportedFormat(format: string | undefined): format is ImageFormat {
  return format !== undefined && format in MEDIA_TYPES;
}

export function toDataUri(mediaType: string, base64: string): string {
  return `data:${mediaType};base64,${base64}`;
}

/**
 * Validate, downscale (never enlarge) and encode an uploaded image
 */
export async function prepareImage(
  input: Uint8Array,
  options: { maxDimension?: number } = {}
): Promise<PreparedImage> {
  const maxDimension = options.maxDimension ?? DEFAULT_MAX_DIMENSION;

  if (input.byteLength === 0) {
    throw new InvalidRequestError("Image is empty");
  }

  let format: string | undefined;
  try {
    format = (await sharp(input).metadata()).format;
  } catch (err) {
    throw new InvalidRequestError("Image could not be decoded", err);
  }

  if (!isSupportedFormat(format)) {
    throw new InvalidRequestError(
      `Unsupported image format "${format ?? "unknown"}"; upload PNG, JPEG or WEBP`
    );
  }

  let output: { data: Buffer; info: sharp.OutputInfo };
  try {
    output = await sharp(input)
      .rotate()
      .resize(maxDimension, maxDimension, { fit: "inside", withoutEnlargement: true })
      .toFormat(format)
      .toBuffer({ resolveWithObject: true });
  } catch (err) {
    throw new InvalidRequestError("Image could not be processed", err);
  }

  const { data, info } = output;
  const mediaType = MEDIA_TYPES[format];
  const base64 = data.toString("base64");

  return {
    mediaType,
    base64,
    dataUri: toDataUri(mediaType, base64),
    width: info.width,
    height: info.height,
    bytes: data.length,
  };
}
