import { describe, expect, it, vi } from "vitest";
import { LaunchFailure } from "../errors.js";
import type { FeedbackRequest, FeedbackResult } from "../feedback-types.js";
import { FeedbackToolService, formatFeedbackText } from "./feedback-tool.js";

describe("feedback tool", () => {
  it("appends the directive annotation and converts images", async () => {
    const launch = vi.fn(async (_request: FeedbackRequest): Promise<FeedbackResult> => ({
      interactive_feedback: "Option A\n\nplease rename it",
      session_control: "terminate",
      images: [{ bytesBase64Encoded: "/9j/4A==", mimeType: "image/jpeg" }],
    }));
    const service = new FeedbackToolService(launch);

    const response = await service.requestFeedback("rename?", [" Option A ", "", "Option B"], "ts repo");

    expect(launch).toHaveBeenCalledWith({
      prompt: "rename?",
      predefinedOptions: ["Option A", "Option B"],
      contextInfo: "ts repo",
    });
    expect(response).toEqual({
      text: "Option A\n\nplease rename it\n\n[会话控制: terminate]",
      directive: "terminate",
      images: [{ type: "image", data: "/9j/4A==", mimeType: "image/jpeg" }],
    });
  });

  it("returns no images when the result carries none", async () => {
    const service = new FeedbackToolService(async () => ({ interactive_feedback: "", session_control: "continue" }));

    const response = await service.requestFeedback("anything else?");

    expect(response).toEqual({ text: "\n\n[会话控制: continue]", directive: "continue", images: [] });
  });

  it("propagates launch failures", async () => {
    const service = new FeedbackToolService(async () => {
      throw new LaunchFailure("feedback ui failed with exit code 1", { exitCode: 1, signal: null, stderrTail: "" });
    });

    await expect(service.requestFeedback("x")).rejects.toBeInstanceOf(LaunchFailure);
  });

  it("formats the annotation for either directive", () => {
    expect(formatFeedbackText({ interactive_feedback: "go", session_control: "continue" })).toBe(
      "go\n\n[会话控制: continue]",
    );
  });
});
