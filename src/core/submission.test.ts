import { describe, expect, it } from "vitest";
import type { ImagePayload, PredefinedOption } from "../feedback-types.js";
import {
  annotatePathTokens,
  assembleFeedbackResult,
  buildClosedResult,
  composeFeedbackText,
  parsePredefinedOptions,
} from "./submission.js";

const PNG: ImagePayload = { bytesBase64Encoded: "iVBORw0KGgo=", mimeType: "image/png" };
const JPEG: ImagePayload = { bytesBase64Encoded: "/9j/4A==", mimeType: "image/jpeg" };

function options(labels: string[], checked: string[]): PredefinedOption[] {
  return labels.map((label) => ({ label, checked: checked.includes(label) }));
}

describe("feedback text composition", () => {
  it("joins checked options and free text with a blank line", () => {
    expect(composeFeedbackText(options(["A", "B", "C"], ["A", "B"]), "hello")).toBe("A; B\n\nhello");
  });

  it("keeps declared option order regardless of check order", () => {
    expect(composeFeedbackText(options(["first", "second"], ["second", "first"]), "")).toBe("first; second");
  });

  it("uses whichever part is present", () => {
    expect(composeFeedbackText(options(["A"], []), "  only text  ")).toBe("only text");
    expect(composeFeedbackText(options(["A"], ["A"]), "   ")).toBe("A");
    expect(composeFeedbackText([], "")).toBe("");
  });
});

describe("path annotation", () => {
  it("wraps path-like tokens", () => {
    expect(annotatePathTokens("/usr/local/bin")).toBe('用户提供文件路径："/usr/local/bin"');
    expect(annotatePathTokens("see C:\\work\\a.txt now")).toBe('see 用户提供文件路径："C:\\work\\a.txt" now');
  });

  it("leaves urls alone", () => {
    expect(annotatePathTokens("https://example.com/a/b")).toBe("https://example.com/a/b");
    expect(annotatePathTokens("http://example.com/x")).toBe("http://example.com/x");
  });

  it("annotates slash-bearing non-paths under the heuristic", () => {
    expect(annotatePathTokens("3/4")).toBe('用户提供文件路径："3/4"');
  });

  it("preserves whitespace runs and does not double-wrap", () => {
    expect(annotatePathTokens("a\t src/x.ts\n\nb")).toBe('a\t 用户提供文件路径："src/x.ts"\n\nb');

    const once = annotatePathTokens("src/x.ts");
    expect(annotatePathTokens(once)).toBe(once);
  });
});

describe("result assembly", () => {
  it("builds an empty continue result when nothing was entered", () => {
    expect(
      assembleFeedbackResult({
        options: [],
        freeText: "",
        directive: "continue",
        imagesEnabled: true,
        storeImages: [],
        inlineImages: [],
      }),
    ).toEqual({ interactive_feedback: "", session_control: "continue", images: [] });

    const withoutImages = assembleFeedbackResult({
      options: [],
      freeText: "",
      directive: "continue",
      imagesEnabled: false,
      storeImages: [PNG],
      inlineImages: [],
    });
    expect(withoutImages).toEqual({ interactive_feedback: "", session_control: "continue" });
    expect("images" in withoutImages).toBe(false);
  });

  it("puts store images before inline images without de-duplication", () => {
    const result = assembleFeedbackResult({
      options: options(["A"], ["A"]),
      freeText: "fix src/app.ts",
      directive: "terminate",
      imagesEnabled: true,
      storeImages: [JPEG, PNG],
      inlineImages: [PNG],
    });

    expect(result).toEqual({
      interactive_feedback: 'A\n\nfix 用户提供文件路径："src/app.ts"',
      session_control: "terminate",
      images: [JPEG, PNG, PNG],
    });
    expect(Object.isFrozen(result)).toBe(true);
  });

  it("builds the implicit terminate payload for a closed surface", () => {
    const closed = buildClosedResult();

    expect(closed).toEqual({ interactive_feedback: "", session_control: "terminate", images: [] });
    expect(Object.isFrozen(closed)).toBe(true);
  });
});

describe("predefined option parsing", () => {
  it("splits on the triple pipe and drops empty entries", () => {
    expect(parsePredefinedOptions("yes||| no |||")).toEqual(["yes", "no"]);
    expect(parsePredefinedOptions("")).toEqual([]);
    expect(parsePredefinedOptions(undefined)).toEqual([]);
  });
});
