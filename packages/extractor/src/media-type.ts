import type { MediaType } from "@ingestline/types";

const EXTENSION_MEDIA_TYPES: Record<string, MediaType> = {
  ".pdf": "application/pdf",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".tif": "image/tiff",
  ".tiff": "image/tiff",
  ".bmp": "image/bmp",
  ".md": "text/markdown",
  ".markdown": "text/markdown",
  ".txt": "text/plain",
  ".html": "text/html",
  ".htm": "text/html",
  ".csv": "text/csv",
  ".json": "application/json",
};

const SIGNATURES: Partial<Record<MediaType, number[][]>> = {
  "application/pdf": [[0x25, 0x50, 0x44, 0x46, 0x2d]],
  "image/png": [[0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]],
  "image/jpeg": [[0xff, 0xd8, 0xff]],
  "image/tiff": [
    [0x49, 0x49, 0x2a, 0x00],
    [0x4d, 0x4d, 0x00, 0x2a],
  ],
  "image/bmp": [[0x42, 0x4d]],
};

export function detectMediaType(path: string): MediaType {
  const dot = path.lastIndexOf(".");
  const slash = Math.max(path.lastIndexOf("/"), path.lastIndexOf("\\"));
  if (dot <= slash + 1) {
    return "application/octet-stream";
  }
  const extension = path.slice(dot).toLowerCase();
  return EXTENSION_MEDIA_TYPES[extension] ?? "application/octet-stream";
}

export function isBinaryMediaType(mediaType: MediaType): boolean {
  return SIGNATURES[mediaType] !== undefined;
}

/**
 * Check the leading magic bytes for binary formats. Text formats have no
 * signature and always match.
 */
export function matchesSignature(mediaType: MediaType, content: Uint8Array): boolean {
  const signatures = SIGNATURES[mediaType];
  if (!signatures) {
    return true;
  }
  return signatures.some(
    (signature) =>
      content.length >= signature.length && signature.every((byte, i) => content[i] === byte),
  );
}
