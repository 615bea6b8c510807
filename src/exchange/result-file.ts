import fs from "node:fs";
import path from "node:path";
import type { Writable } from "node:stream";
import { MissingResultFile, ResultReadFailure, errorMessage } from "../errors.js";
import type { FeedbackResult, ImagePayload } from "../feedback-types.js";
import { isSupportedImageMimeType } from "../core/images.js";
import { isRecord, safeJsonParse } from "../rpc/protocol.js";

export type FeedbackResultParse = { ok: true; result: FeedbackResult } | { ok: false; error: string };

export function parseFeedbackResult(value: unknown): FeedbackResultParse {
  if (!isRecord(value)) {
    return { ok: false, error: "expected a json object" };
  }
  if (typeof value.interactive_feedback !== "string") {
    return { ok: false, error: "`interactive_feedback` must be a string" };
  }
  const directive = value.session_control;
  if (directive !== "continue" && directive !== "terminate") {
    return { ok: false, error: '`session_control` must be "continue" or "terminate"' };
  }

  const result: FeedbackResult = {
    interactive_feedback: value.interactive_feedback,
    session_control: directive,
  };
  if (!("images" in value) || value.images === undefined) {
    return { ok: true, result };
  }
  if (!Array.isArray(value.images)) {
    return { ok: false, error: "`images` must be an array" };
  }

  const images: ImagePayload[] = [];
  for (const [index, entry] of value.images.entries()) {
    if (!isRecord(entry) || typeof entry.bytesBase64Encoded !== "string" || typeof entry.mimeType !== "string") {
      return { ok: false, error: `images[${index}] must carry bytesBase64Encoded and mimeType strings` };
    }
    if (!isSupportedImageMimeType(entry.mimeType)) {
      return { ok: false, error: `images[${index}] has unsupported mime type ${entry.mimeType}` };
    }
    images.push({ bytesBase64Encoded: entry.bytesBase64Encoded, mimeType: entry.mimeType });
  }
  result.images = images;
  return { ok: true, result };
}

/** Writes through a sibling temp file so readers never see a partial document. */
export function writeResultFile(filePath: string, result: FeedbackResult): void {
  const resolved = path.resolve(filePath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  const tempPath = `${resolved}.${process.pid}.tmp`;
  fs.writeFileSync(tempPath, `${JSON.stringify(result, null, 2)}\n`, "utf8");
  fs.renameSync(tempPath, resolved);
}

/**
 * Prints the result as one json line and resolves once the stream has taken
 * it, so a caller may exit right after without cutting a piped payload short.
 */
export function writeResultStream(output: Writable, result: FeedbackResult): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    output.write(`${JSON.stringify(result)}\n`, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

/** Reads and deletes the result file; the file is gone afterwards either way. */
export function consumeResultFile(filePath: string): FeedbackResult {
  if (!fs.existsSync(filePath)) {
    throw new MissingResultFile(filePath);
  }

  try {
    let raw: string;
    try {
      raw = fs.readFileSync(filePath, "utf8");
    } catch (error) {
      throw new ResultReadFailure(filePath, errorMessage(error));
    }

    const parsed = safeJsonParse(raw);
    if (!parsed.ok) {
      throw new ResultReadFailure(filePath, parsed.error.message);
    }
    const validated = parseFeedbackResult(parsed.value);
    if (!validated.ok) {
      throw new ResultReadFailure(filePath, validated.error);
    }
    return validated.result;
  } finally {
    fs.rmSync(filePath, { force: true });
  }
}
