import type { FeedbackConfig } from "../config.js";
import { ServiceUnavailableError, errorMessage } from "../errors.js";
import { createScopedLogger } from "../logging.js";
import { GeminiRewriteCapability } from "./gemini.js";
import type { RewriteCapability } from "./types.js";

const log = createScopedLogger("enhancer");

export class UnavailableRewriteCapability implements RewriteCapability {
  readonly name = "unavailable";

  constructor(private readonly reason: string) {}

  isAvailable(): boolean {
    return false;
  }

  unavailableReason(): string {
    return this.reason;
  }

  async streamRewrite(): Promise<void> {
    throw new ServiceUnavailableError(this.reason);
  }

  async rewrite(): Promise<string> {
    throw new ServiceUnavailableError(this.reason);
  }
}

/** Picks the real client or the stub once, at startup. */
export function createRewriteCapability(
  config: Pick<FeedbackConfig, "geminiApiKey" | "geminiModel" | "rewriteTemperature">,
): RewriteCapability {
  if (!config.geminiApiKey) {
    const reason = "prompt enhancement unavailable: GEMINI_API_KEY is not set in the environment";
    log(reason);
    return new UnavailableRewriteCapability(reason);
  }

  try {
    return new GeminiRewriteCapability({
      apiKey: config.geminiApiKey,
      model: config.geminiModel,
      temperature: config.rewriteTemperature,
    });
  } catch (error) {
    const reason = `prompt enhancement unavailable: ${errorMessage(error)}`;
    log(reason);
    return new UnavailableRewriteCapability(reason);
  }
}

export { GeminiRewriteCapability } from "./gemini.js";
export { buildRewriteUserContent } from "./prompt.js";
export { ERROR_CHUNK_PREFIX, isErrorChunk } from "./types.js";
export type { RewriteCapability, RewriteRequest, RewriteSink } from "./types.js";
