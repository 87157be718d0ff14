/**
 * Image MIME type mappings shared by the recognizer and the CLI.
 */

import { extname } from "node:path";

export const DEFAULT_IMAGE_MIME_TYPE = "image/png";

export const IMAGE_MIME_TYPES = new Set([
  "image/jpeg",
  "image/png",
  "image/webp",
  "image/gif",
  "image/tiff",
  "image/bmp",
]);

const IMAGE_EXTENSIONS: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".webp": "image/webp",
  ".gif": "image/gif",
  ".tif": "image/tiff",
  ".tiff": "image/tiff",
  ".bmp": "image/bmp",
};

export function isImage(mimeType: string): boolean {
  return mimeType.startsWith("image/") || IMAGE_MIME_TYPES.has(mimeType);
}

/**
 * MIME type implied by a file name, or undefined for non-image files.
 */
export function imageMimeTypeForPath(filePath: string): string | undefined {
  return IMAGE_EXTENSIONS[extname(filePath).toLowerCase()];
}
