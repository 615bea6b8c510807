import { GoogleGenAI, type GenerateContentParameters } from "@google/genai";
import { ServiceUnavailableError, UpstreamError, errorMessage, isFeedbackError } from "../errors.js";
import { createScopedLogger } from "../logging.js";
import type { RewriteCapability, RewriteRequest, RewriteSink } from "./types.js";

const log = createScopedLogger("gemini");

type GeminiTextResponse = {
  text?: string | undefined;
};

/** The slice of `GoogleGenAI["models"]` the rewrite path calls. */
export interface GeminiModels {
  generateContent(params: GenerateContentParameters): Promise<GeminiTextResponse>;
  generateContentStream(params: GenerateContentParameters): Promise<AsyncIterable<GeminiTextResponse>>;
}

export type GeminiRewriteOptions = {
  apiKey: string;
  model: string;
  temperature: number;
  models?: GeminiModels;
};

export class GeminiRewriteCapability implements RewriteCapability {
  readonly name = "gemini";
  private readonly models: GeminiModels;

  constructor(private readonly options: GeminiRewriteOptions) {
    if (!options.apiKey.trim() && !options.models) {
      throw new ServiceUnavailableError("missing GEMINI_API_KEY; set it in the server environment");
    }
    this.models = options.models ?? new GoogleGenAI({ apiKey: options.apiKey }).models;
  }

  isAvailable(): boolean {
    return true;
  }

  unavailableReason(): string | null {
    return null;
  }

  async streamRewrite(request: RewriteRequest, sink: RewriteSink): Promise<void> {
    log(`streaming rewrite with ${this.options.model} (${request.userContent.length} chars)`);
    let received = 0;
    try {
      const stream = await this.models.generateContentStream(this.buildParams(request));
      for await (const chunk of stream) {
        if (request.signal.aborted) {
          log("rewrite stream aborted by caller");
          return;
        }
        const text = readChunkText(chunk);
        if (text) {
          received += 1;
          sink(text);
        }
      }
    } catch (error) {
      throw toUpstreamError(error);
    }
    log(`rewrite stream finished after ${received} chunk(s)`);
  }

  async rewrite(request: RewriteRequest): Promise<string> {
    log(`one-shot rewrite with ${this.options.model}`);
    try {
      const response = await this.models.generateContent(this.buildParams(request));
      return (readChunkText(response) ?? "").trim();
    } catch (error) {
      throw toUpstreamError(error);
    }
  }

  private buildParams(request: RewriteRequest): GenerateContentParameters {
    return {
      model: this.options.model,
      contents: [
        {
          role: "user",
          parts: [{ text: request.userContent }],
        },
      ],
      config: {
        systemInstruction: request.systemInstruction,
        responseMimeType: "text/plain",
        temperature: this.options.temperature,
        abortSignal: request.signal,
      },
    };
  }
}

function readChunkText(chunk: unknown): string | undefined {
  if (typeof chunk !== "object" || chunk === null || !("text" in chunk)) {
    throw new UpstreamError("gemini returned a malformed response chunk");
  }
  const text = chunk.text;
  if (text === undefined || text === null) {
    return undefined;
  }
  if (typeof text !== "string") {
    throw new UpstreamError("gemini returned a non-text response chunk");
  }
  return text;
}

function toUpstreamError(error: unknown): Error {
  if (isFeedbackError(error)) {
    return error;
  }
  const message = errorMessage(error);
  log(`gemini request failed: ${message}`);
  return new UpstreamError(`gemini request failed: ${message}`);
}
