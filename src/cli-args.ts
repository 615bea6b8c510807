import { parsePredefinedOptions } from "./core/submission.js";
import type { FeedbackRequest } from "./feedback-types.js";

export const DEFAULT_UI_PROMPT = "Please share your feedback.";

export type UiCommandArgs = {
  request: FeedbackRequest;
  outputFile?: string;
  /** Unset when neither image flag was given; configuration decides then. */
  imagesEnabled?: boolean;
};

const VALUE_FLAGS = new Set(["--prompt", "--predefined-options", "--context-info", "--output-file"]);

export function parseUiArgs(args: readonly string[]): UiCommandArgs {
  const values = new Map<string, string>();
  let imagesEnabled: boolean | undefined;

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index] ?? "";
    if (arg === "--enable-images") {
      imagesEnabled = true;
      continue;
    }
    if (arg === "--disable-image-upload") {
      imagesEnabled = false;
      continue;
    }

    const separator = arg.indexOf("=");
    const flag = separator > 0 ? arg.slice(0, separator) : arg;
    if (!VALUE_FLAGS.has(flag)) {
      throw new Error(`unknown option: ${arg}`);
    }
    if (separator > 0) {
      values.set(flag, arg.slice(separator + 1));
      continue;
    }
    const value = args[index + 1];
    if (value === undefined) {
      throw new Error(`missing value for ${flag}`);
    }
    values.set(flag, value);
    index += 1;
  }

  return {
    request: {
      prompt: values.get("--prompt") || DEFAULT_UI_PROMPT,
      predefinedOptions: parsePredefinedOptions(values.get("--predefined-options")),
      contextInfo: values.get("--context-info") ?? "",
    },
    outputFile: values.get("--output-file") || undefined,
    imagesEnabled,
  };
}
