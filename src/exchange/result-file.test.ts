import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Writable } from "node:stream";
import { afterEach, describe, expect, it } from "vitest";
import { MissingResultFile, ResultReadFailure } from "../errors.js";
import type { FeedbackResult } from "../feedback-types.js";
import { consumeResultFile, parseFeedbackResult, writeResultFile, writeResultStream } from "./result-file.js";

const cleanupDirs: string[] = [];

afterEach(() => {
  for (const dir of cleanupDirs.splice(0, cleanupDirs.length)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function tempDir(): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "feedback-result-"));
  cleanupDirs.push(root);
  return root;
}

describe("result file exchange", () => {
  it("reads back what was written and removes the file", () => {
    const root = tempDir();
    const filePath = path.join(root, "nested", "result.json");
    const result: FeedbackResult = {
      interactive_feedback: "A; B\n\nlooks good",
      session_control: "terminate",
      images: [{ bytesBase64Encoded: "iVBORw0KGgo=", mimeType: "image/png" }],
    };

    writeResultFile(filePath, result);
    expect(fs.readdirSync(path.dirname(filePath))).toEqual(["result.json"]);

    expect(consumeResultFile(filePath)).toEqual(result);
    expect(fs.existsSync(filePath)).toBe(false);
  });

  it("raises a missing-file failure when nothing was written", () => {
    const filePath = path.join(tempDir(), "absent.json");

    expect(() => consumeResultFile(filePath)).toThrowError(MissingResultFile);
    expect(() => consumeResultFile(filePath)).toThrowError(`result file does not exist: ${filePath}`);
  });

  it("deletes unreadable documents after reporting them", () => {
    const filePath = path.join(tempDir(), "broken.json");
    fs.writeFileSync(filePath, "{ not json", "utf8");

    expect(() => consumeResultFile(filePath)).toThrowError(ResultReadFailure);
    expect(fs.existsSync(filePath)).toBe(false);
  });

  it("rejects documents with the wrong shape", () => {
    const filePath = path.join(tempDir(), "shape.json");
    fs.writeFileSync(filePath, JSON.stringify({ interactive_feedback: "x", session_control: "pause" }), "utf8");

    expect(() => consumeResultFile(filePath)).toThrowError(
      `unable to read result file ${filePath}: \`session_control\` must be "continue" or "terminate"`,
    );
    expect(fs.existsSync(filePath)).toBe(false);
  });
});

describe("feedback result validation", () => {
  it("keeps the images key absent when the document has none", () => {
    expect(parseFeedbackResult({ interactive_feedback: "", session_control: "continue" })).toEqual({
      ok: true,
      result: { interactive_feedback: "", session_control: "continue" },
    });
  });

  it("rejects malformed image entries", () => {
    expect(
      parseFeedbackResult({
        interactive_feedback: "",
        session_control: "continue",
        images: [{ bytesBase64Encoded: "AAAA", mimeType: "image/tiff" }],
      }),
    ).toEqual({ ok: false, error: "images[0] has unsupported mime type image/tiff" });
    expect(parseFeedbackResult({ interactive_feedback: 3, session_control: "continue" })).toEqual({
      ok: false,
      error: "`interactive_feedback` must be a string",
    });
    expect(parseFeedbackResult([])).toEqual({ ok: false, error: "expected a json object" });
  });
});

describe("result stream output", () => {
  it("resolves only after the stream has taken the whole line", async () => {
    const chunks: string[] = [];
    let flushed = false;
    const output = new Writable({
      write(chunk, _encoding, callback) {
        setTimeout(() => {
          chunks.push(String(chunk));
          flushed = true;
          callback();
        }, 5);
      },
    });
    const result: FeedbackResult = {
      interactive_feedback: "done",
      session_control: "terminate",
      images: [{ bytesBase64Encoded: "iVBORw0KGgo=".repeat(4096), mimeType: "image/png" }],
    };

    const written = writeResultStream(output, result);
    expect(flushed).toBe(false);
    await written;

    expect(flushed).toBe(true);
    expect(chunks.join("")).toBe(`${JSON.stringify(result)}\n`);
  });
});
