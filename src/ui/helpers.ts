import type { SessionImage } from "../core/feedback-session.js";
import { estimateImageByteSize, formatByteSize } from "../core/images.js";

export type FocusPane = "options" | "text" | "directive" | "images";

export type LineCommand = { kind: "image"; path: string } | { kind: "clear-images" };

const FOCUS_ORDER: readonly FocusPane[] = ["options", "text", "directive", "images"];

export function stripBoldMarkers(text: string): string {
  return text.replace(/\*\*(.+?)\*\*/g, "$1").replace(/__(.+?)__/g, "$1");
}

export function nextFocus(
  current: FocusPane,
  available: { options: boolean; images: boolean },
  direction: 1 | -1 = 1,
): FocusPane {
  const panes = FOCUS_ORDER.filter(
    (pane) => (pane !== "options" || available.options) && (pane !== "images" || available.images),
  );
  const index = panes.indexOf(current);
  const next = panes[(index + direction + panes.length) % panes.length];
  return next ?? "text";
}

export function parseLineCommand(line: string): LineCommand | null {
  const trimmed = line.trim();
  if (trimmed === "/clear-images") {
    return { kind: "clear-images" };
  }
  const match = /^\/image(?:\s+(.*))?$/.exec(trimmed);
  if (!match) {
    return null;
  }
  return { kind: "image", path: (match[1] ?? "").trim() };
}

/** Splits a trailing `/command` line off the text, if the last line is one. */
export function takeTrailingLineCommand(text: string): { command: LineCommand; rest: string } | null {
  const lines = text.split("\n");
  const last = lines.pop() ?? "";
  const command = parseLineCommand(last);
  if (!command) {
    return null;
  }
  return { command, rest: lines.join("\n") };
}

export function normalizeTypedInput(input: string): string {
  return input.replace(/\r\n?/g, "\n");
}

export function clampIndex(index: number, length: number): number {
  if (length <= 0) {
    return 0;
  }
  return Math.min(Math.max(index, 0), length - 1);
}

export function describeImage(entry: SessionImage, index: number): string {
  const size = formatByteSize(estimateImageByteSize(entry.image));
  return `#${index + 1} ${entry.image.mimeType} ${size} (${entry.source === "inline" ? "pasted" : "attached"})`;
}
