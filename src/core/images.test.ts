import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  detectImageMimeType,
  estimateImageByteSize,
  extractInlineImages,
  formatByteSize,
  loadImagePayloadFromDataUrl,
  loadImagePayloadFromPath,
} from "./images.js";

const PNG_HEADER_BASE64 = "iVBORw0KGgo=";
const JPEG_HEADER_BASE64 = "/9j/4A==";

const tempFiles: string[] = [];

afterEach(() => {
  for (const filePath of tempFiles.splice(0)) {
    try {
      fs.rmSync(filePath, { force: true });
    } catch {
      // ignore cleanup failures
    }
  }
});

function writeTempFile(name: string, bytes: Buffer): string {
  const filePath = path.join(os.tmpdir(), `feedback-img-${Date.now()}-${Math.random().toString(16).slice(2)}-${name}`);
  tempFiles.push(filePath);
  fs.writeFileSync(filePath, bytes);
  return filePath;
}

describe("image mime detection", () => {
  it("prefers magic bytes over the file name", () => {
    expect(detectImageMimeType(Buffer.from([0xff, 0xd8, 0xff, 0xe0]), "photo.png")).toBe("image/jpeg");
    expect(detectImageMimeType(Buffer.from("GIF89a"), "x.bin")).toBe("image/gif");
    expect(detectImageMimeType(Buffer.from("BMxx"))).toBe("image/bmp");
  });

  it("falls back to the extension, then to png", () => {
    expect(detectImageMimeType(Buffer.from("????"), "scan.BMP")).toBe("image/bmp");
    expect(detectImageMimeType(Buffer.from("????"), "notes.txt")).toBe("image/png");
    expect(detectImageMimeType(Buffer.alloc(0))).toBe("image/png");
  });
});

describe("loading image payloads", () => {
  it("loads a local file as base64", () => {
    const filePath = writeTempFile("shot.jpg", Buffer.from([0xff, 0xd8, 0xff, 0xe0]));

    const result = loadImagePayloadFromPath(filePath);
    expect(result).toEqual({
      ok: true,
      image: { bytesBase64Encoded: JPEG_HEADER_BASE64, mimeType: "image/jpeg" },
    });
  });

  it("rejects missing files and unsupported extensions", () => {
    expect(loadImagePayloadFromPath("/tmp/does-not-exist-feedback.png").ok).toBe(false);

    const textFile = writeTempFile("notes.txt", Buffer.from("hello"));
    const result = loadImagePayloadFromPath(textFile);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toContain("unsupported image type: .txt");
    }
  });

  it("rejects an empty path", () => {
    expect(loadImagePayloadFromPath("   ")).toEqual({ ok: false, error: "no file path provided" });
  });

  it("loads data urls and keeps the declared type when bytes are unknown", () => {
    expect(loadImagePayloadFromDataUrl(`data:image/png;base64,${PNG_HEADER_BASE64}`)).toEqual({
      ok: true,
      image: { bytesBase64Encoded: PNG_HEADER_BASE64, mimeType: "image/png" },
    });

    const unknownBytes = Buffer.from("abc").toString("base64");
    expect(loadImagePayloadFromDataUrl(`data:image/gif;base64,${unknownBytes}`)).toEqual({
      ok: true,
      image: { bytesBase64Encoded: unknownBytes, mimeType: "image/gif" },
    });
  });

  it("rejects malformed data urls", () => {
    expect(loadImagePayloadFromDataUrl("not a data url").ok).toBe(false);
    expect(loadImagePayloadFromDataUrl("data:text/plain;base64,aGVsbG8=").ok).toBe(false);
    expect(loadImagePayloadFromDataUrl("data:image/png;base64,@@@").ok).toBe(false);
  });
});

describe("inline image capture", () => {
  it("removes pasted data urls from the text and decodes them in order", () => {
    const extraction = extractInlineImages(
      `look data:image/png;base64,${PNG_HEADER_BASE64} and data:image/jpeg;base64,${JPEG_HEADER_BASE64}`,
    );

    expect(extraction.text).toBe("look  and ");
    expect(extraction.images).toEqual([
      { bytesBase64Encoded: PNG_HEADER_BASE64, mimeType: "image/png" },
      { bytesBase64Encoded: JPEG_HEADER_BASE64, mimeType: "image/jpeg" },
    ]);
    expect(extraction.errors).toEqual([]);
  });

  it("reports a broken token without dropping the others", () => {
    const extraction = extractInlineImages(`data:image/png;base64,A data:image/png;base64,${PNG_HEADER_BASE64}`);

    expect(extraction.images).toHaveLength(1);
    expect(extraction.errors).toEqual(["image payload is empty"]);
  });

  it("can leave a token that reaches the end of the text", () => {
    const text = `a data:image/png;base64,${PNG_HEADER_BASE64} b data:image/jpeg;base64,${JPEG_HEADER_BASE64}`;

    const extraction = extractInlineImages(text, { keepTrailingToken: true });

    expect(extraction.text).toBe(`a  b data:image/jpeg;base64,${JPEG_HEADER_BASE64}`);
    expect(extraction.images).toEqual([{ bytesBase64Encoded: PNG_HEADER_BASE64, mimeType: "image/png" }]);
    expect(extractInlineImages(text).images).toHaveLength(2);
  });

  it("leaves plain text alone", () => {
    expect(extractInlineImages("no images here")).toEqual({ text: "no images here", images: [], errors: [] });
  });
});

describe("byte size helpers", () => {
  it("formats sizes and estimates decoded length", () => {
    expect(formatByteSize(512)).toBe("512 b");
    expect(formatByteSize(8 * 1024 * 1024)).toBe("8.00 mb");
    expect(estimateImageByteSize({ bytesBase64Encoded: PNG_HEADER_BASE64, mimeType: "image/png" })).toBe(8);
  });
});
