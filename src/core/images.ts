import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { ImageMimeType, ImagePayload } from "../feedback-types.js";

export const MAX_IMAGE_FILE_BYTES = 8 * 1024 * 1024;
export const DEFAULT_IMAGE_MIME_TYPE: ImageMimeType = "image/png";

const IMAGE_MIME_BY_EXT: Record<string, ImageMimeType> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".bmp": "image/bmp",
  ".gif": "image/gif",
};

const SUPPORTED_MIME_TYPES: readonly ImageMimeType[] = ["image/png", "image/jpeg", "image/bmp", "image/gif"];

const INLINE_DATA_URL_PATTERN = /data:image\/[a-z0-9.+-]+;base64,[a-z0-9+/=]+/gi;
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

export type ImageLoadResult = { ok: true; image: ImagePayload } | { ok: false; error: string };

export function isSupportedImageMimeType(value: string): value is ImageMimeType {
  return SUPPORTED_MIME_TYPES.some((mimeType) => mimeType === value);
}

/** Magic bytes win over the file name; unknown data falls back to png. */
export function detectImageMimeType(bytes: Uint8Array, fileName?: string): ImageMimeType {
  if (startsWith(bytes, [0x89, 0x50, 0x4e, 0x47])) {
    return "image/png";
  }
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) {
    return "image/jpeg";
  }
  if (startsWith(bytes, [0x47, 0x49, 0x46, 0x38])) {
    return "image/gif";
  }
  if (startsWith(bytes, [0x42, 0x4d])) {
    return "image/bmp";
  }
  if (fileName) {
    const fromExtension = IMAGE_MIME_BY_EXT[path.extname(fileName).toLowerCase()];
    if (fromExtension) {
      return fromExtension;
    }
  }
  return DEFAULT_IMAGE_MIME_TYPE;
}

export function loadImagePayloadFromPath(rawPath: string): ImageLoadResult {
  const resolvedPath = resolveImagePath(rawPath);
  if (!resolvedPath) {
    return { ok: false, error: "no file path provided" };
  }
  if (!fs.existsSync(resolvedPath)) {
    return { ok: false, error: `file not found: ${resolvedPath}` };
  }

  let stats: fs.Stats;
  try {
    stats = fs.statSync(resolvedPath);
  } catch {
    return { ok: false, error: `unable to stat file: ${resolvedPath}` };
  }
  if (!stats.isFile()) {
    return { ok: false, error: `not a file: ${resolvedPath}` };
  }
  if (stats.size <= 0) {
    return { ok: false, error: `image file is empty: ${resolvedPath}` };
  }
  if (stats.size > MAX_IMAGE_FILE_BYTES) {
    return {
      ok: false,
      error: `image too large (${formatByteSize(stats.size)}). max is ${formatByteSize(MAX_IMAGE_FILE_BYTES)}`,
    };
  }

  const extension = path.extname(resolvedPath).toLowerCase();
  if (!IMAGE_MIME_BY_EXT[extension]) {
    return {
      ok: false,
      error: `unsupported image type: ${extension || "(no extension)"}. supported: ${Object.keys(IMAGE_MIME_BY_EXT).join(", ")}`,
    };
  }

  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(resolvedPath);
  } catch {
    return { ok: false, error: `unable to read image file: ${resolvedPath}` };
  }

  return {
    ok: true,
    image: {
      bytesBase64Encoded: bytes.toString("base64"),
      mimeType: detectImageMimeType(bytes, resolvedPath),
    },
  };
}

export function loadImagePayloadFromDataUrl(rawDataUrl: string): ImageLoadResult {
  const dataUrl = rawDataUrl.trim();
  const match = dataUrl.match(/^data:([^;,]+);base64,(.+)$/is);
  if (!match) {
    return {
      ok: false,
      error: "invalid image data url. expected data:<mime>;base64,<payload>",
    };
  }

  const declaredMimeType = (match[1] ?? "").trim().toLowerCase();
  const payload = (match[2] ?? "").replace(/\s+/g, "");
  if (!declaredMimeType.startsWith("image/")) {
    return { ok: false, error: `unsupported image mime type: ${declaredMimeType || "(none)"}` };
  }
  if (!payload || !BASE64_PATTERN.test(payload)) {
    return { ok: false, error: "invalid base64 image payload" };
  }

  const bytes = Buffer.from(payload, "base64");
  if (bytes.length <= 0) {
    return { ok: false, error: "image payload is empty" };
  }
  if (bytes.length > MAX_IMAGE_FILE_BYTES) {
    return {
      ok: false,
      error: `image too large (${formatByteSize(bytes.length)}). max is ${formatByteSize(MAX_IMAGE_FILE_BYTES)}`,
    };
  }

  const detected = detectImageMimeType(bytes);
  const mimeType =
    detected === DEFAULT_IMAGE_MIME_TYPE && isSupportedImageMimeType(declaredMimeType)
      ? declaredMimeType
      : detected;

  return {
    ok: true,
    image: {
      bytesBase64Encoded: bytes.toString("base64"),
      mimeType,
    },
  };
}

export type InlineImageExtraction = {
  text: string;
  images: ImagePayload[];
  errors: string[];
};

export type InlineImageExtractionOptions = {
  /**
   * Leave a token that runs to the very end of the text in place. A paste can
   * arrive in several chunks, so such a token may still be growing.
   */
  keepTrailingToken?: boolean;
};

/**
 * Pulls pasted `data:image/...;base64,...` tokens out of composed text. Each
 * token is decoded on its own; a broken one is reported and dropped.
 */
export function extractInlineImages(
  text: string,
  options: InlineImageExtractionOptions = {},
): InlineImageExtraction {
  const images: ImagePayload[] = [];
  const errors: string[] = [];
  let cleaned = "";
  let cursor = 0;

  for (const match of text.matchAll(INLINE_DATA_URL_PATTERN)) {
    const token = match[0];
    const start = match.index ?? 0;
    if (options.keepTrailingToken && start + token.length === text.length) {
      break;
    }
    const loaded = loadImagePayloadFromDataUrl(token);
    if (loaded.ok) {
      images.push(loaded.image);
    } else {
      errors.push(loaded.error);
    }
    cleaned += text.slice(cursor, start);
    cursor = start + token.length;
  }

  return { text: cleaned + text.slice(cursor), images, errors };
}

export function formatByteSize(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes < 0) {
    return "0 b";
  }
  if (bytes < 1024) {
    return `${Math.floor(bytes)} b`;
  }
  const kb = bytes / 1024;
  if (kb < 1024) {
    return `${kb.toFixed(kb >= 100 ? 0 : kb >= 10 ? 1 : 2)} kb`;
  }
  const mb = kb / 1024;
  return `${mb.toFixed(mb >= 100 ? 0 : mb >= 10 ? 1 : 2)} mb`;
}

export function estimateImageByteSize(image: ImagePayload): number {
  const encoded = image.bytesBase64Encoded;
  const padding = encoded.endsWith("==") ? 2 : encoded.endsWith("=") ? 1 : 0;
  return Math.max(0, Math.floor((encoded.length * 3) / 4) - padding);
}

function resolveImagePath(rawPath: string): string {
  const trimmed = rawPath.trim();
  if (!trimmed) {
    return "";
  }

  let normalized = trimmed;
  if (
    (normalized.startsWith('"') && normalized.endsWith('"')) ||
    (normalized.startsWith("'") && normalized.endsWith("'"))
  ) {
    normalized = normalized.slice(1, -1).trim();
  }
  if (normalized.startsWith("file://")) {
    try {
      normalized = decodeURIComponent(normalized.slice("file://".length));
    } catch {
      normalized = normalized.slice("file://".length);
    }
  }
  if (normalized.startsWith("~/")) {
    normalized = path.join(os.homedir(), normalized.slice(2));
  }

  if (path.isAbsolute(normalized)) {
    return normalized;
  }
  return path.resolve(process.cwd(), normalized);
}

function startsWith(bytes: Uint8Array, signature: number[]): boolean {
  if (bytes.length < signature.length) {
    return false;
  }
  return signature.every((value, index) => bytes[index] === value);
}
