import type { FeedbackResult, ImagePayload, PredefinedOption, SessionDirective } from "../feedback-types.js";

export const OPTIONS_SEPARATOR = "; ";
export const SECTION_SEPARATOR = "\n\n";
export const PREDEFINED_OPTIONS_DELIMITER = "|||";
export const PATH_ANNOTATION_PREFIX = "用户提供文件路径：\"";
export const PATH_ANNOTATION_SUFFIX = "\"";

export type SubmissionInput = {
  options: readonly PredefinedOption[];
  freeText: string;
  directive: SessionDirective;
  imagesEnabled: boolean;
  storeImages: readonly ImagePayload[];
  inlineImages: readonly ImagePayload[];
};

export function parsePredefinedOptions(raw: string | undefined): string[] {
  if (!raw) {
    return [];
  }
  return raw
    .split(PREDEFINED_OPTIONS_DELIMITER)
    .map((option) => option.trim())
    .filter(Boolean);
}

export function joinPredefinedOptions(options: readonly string[]): string {
  return options.join(PREDEFINED_OPTIONS_DELIMITER);
}

export function composeFeedbackText(options: readonly PredefinedOption[], freeText: string): string {
  const parts: string[] = [];

  const optionsLine = options
    .filter((option) => option.checked)
    .map((option) => option.label)
    .join(OPTIONS_SEPARATOR);
  if (optionsLine) {
    parts.push(optionsLine);
  }

  const trimmed = freeText.trim();
  if (trimmed) {
    parts.push(trimmed);
  }

  return parts.join(SECTION_SEPARATOR);
}

/**
 * Wraps every whitespace-delimited token containing `/` or `\` in the path
 * marker, except http(s) urls and tokens already wrapped. Whitespace runs are
 * kept verbatim. Slash-bearing non-paths (dates, ratios) are annotated too.
 */
export function annotatePathTokens(text: string): string {
  return text
    .split(/(\s+)/)
    .map((token) => (shouldAnnotate(token) ? `${PATH_ANNOTATION_PREFIX}${token}${PATH_ANNOTATION_SUFFIX}` : token))
    .join("");
}

function shouldAnnotate(token: string): boolean {
  if (!token || /^\s+$/.test(token)) {
    return false;
  }
  if (!token.includes("/") && !token.includes("\\")) {
    return false;
  }
  const lowered = token.toLowerCase();
  if (lowered.startsWith("http://") || lowered.startsWith("https://")) {
    return false;
  }
  return !isAnnotated(token);
}

function isAnnotated(token: string): boolean {
  return (
    token.startsWith(PATH_ANNOTATION_PREFIX) &&
    token.endsWith(PATH_ANNOTATION_SUFFIX) &&
    token.length > PATH_ANNOTATION_PREFIX.length
  );
}

export function mergeImages(
  storeImages: readonly ImagePayload[],
  inlineImages: readonly ImagePayload[],
): ImagePayload[] {
  return [...storeImages, ...inlineImages].map((image) => ({ ...image }));
}

export function assembleFeedbackResult(input: SubmissionInput): FeedbackResult {
  const result: FeedbackResult = {
    interactive_feedback: annotatePathTokens(composeFeedbackText(input.options, input.freeText)),
    session_control: input.directive,
  };
  if (input.imagesEnabled) {
    result.images = mergeImages(input.storeImages, input.inlineImages);
  }
  return freezeResult(result);
}

/**
 * Payload for a surface closed without submitting: an implicit terminate.
 * It always carries an empty image list, whatever the image setting.
 */
export function buildClosedResult(): FeedbackResult {
  return freezeResult({
    interactive_feedback: "",
    session_control: "terminate",
    images: [],
  });
}

function freezeResult(result: FeedbackResult): FeedbackResult {
  if (result.images) {
    for (const image of result.images) {
      Object.freeze(image);
    }
    Object.freeze(result.images);
  }
  return Object.freeze(result);
}
