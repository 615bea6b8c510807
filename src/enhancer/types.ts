export type RewriteRequest = {
  systemInstruction: string;
  userContent: string;
  signal: AbortSignal;
};

export type RewriteSink = (chunk: string) => void;

/**
 * A text-rewriting service. `streamRewrite` resolves once the stream ends and
 * hands every chunk to the sink in arrival order; it stops early when the
 * request signal aborts.
 */
export interface RewriteCapability {
  readonly name: string;
  isAvailable(): boolean;
  unavailableReason(): string | null;
  streamRewrite(request: RewriteRequest, sink: RewriteSink): Promise<void>;
  rewrite(request: RewriteRequest): Promise<string>;
}

// Chunks carrying this prefix are error reports, not rewrite output.
export const ERROR_CHUNK_PREFIX = "错误：";

export function isErrorChunk(chunk: string): boolean {
  return chunk.trimStart().startsWith(ERROR_CHUNK_PREFIX);
}
