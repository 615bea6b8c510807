import { describe, expect, it, vi } from "vitest";
import { FeedbackError } from "../errors.js";
import { SessionDirectiveSelector, isSessionDirective } from "./session-directive.js";

describe("session directive selector", () => {
  it("starts on continue and switches freely before submission", () => {
    const selector = new SessionDirectiveSelector();
    expect(selector.current()).toBe("continue");

    selector.select("terminate");
    expect(selector.current()).toBe("terminate");
    selector.select("continue");
    expect(selector.current()).toBe("continue");
  });

  it("rejects the reserved pause directive", () => {
    const selector = new SessionDirectiveSelector();
    expect(() => selector.select("pause")).toThrowError('session directive "pause" is reserved');
    expect(selector.current()).toBe("continue");
  });

  it("is read-only once frozen", () => {
    const selector = new SessionDirectiveSelector();
    selector.select("terminate");
    selector.freeze();

    expect(() => selector.select("continue")).toThrowError(FeedbackError);
    expect(selector.current()).toBe("terminate");
    expect(selector.isFrozen()).toBe(true);
  });

  it("notifies subscribers only on changes", () => {
    const selector = new SessionDirectiveSelector();
    const listener = vi.fn();
    selector.subscribe(listener);

    selector.select("continue");
    selector.select("terminate");

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith("terminate");
  });

  it("describes the active directive", () => {
    const selector = new SessionDirectiveSelector();
    selector.select("terminate");
    expect(selector.describe()).toBe("the agent completes the current task and stops asking for feedback");
  });

  it("recognizes directive values", () => {
    expect(isSessionDirective("continue")).toBe(true);
    expect(isSessionDirective("pause")).toBe(false);
    expect(isSessionDirective(1)).toBe(false);
  });
});
