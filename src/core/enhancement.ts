import {
  EmptyInputError,
  EmptyResponseError,
  FeedbackError,
  ServiceUnavailableError,
  UpstreamError,
  errorMessage,
  isFeedbackError,
} from "../errors.js";
import { buildRewriteUserContent } from "../enhancer/prompt.js";
import { isErrorChunk, type RewriteCapability, type RewriteRequest } from "../enhancer/types.js";
import { createScopedLogger } from "../logging.js";

const log = createScopedLogger("enhance");

export interface TextBuffer {
  getText(): string;
  setText(text: string): void;
}

export type EnhancementSession = {
  originalText: string;
  accumulatedText: string;
  isRunning: boolean;
};

export type EnhancementEvent =
  | { type: "started"; originalText: string }
  | { type: "chunk"; chunk: string; accumulatedText: string }
  | { type: "completed"; text: string }
  | { type: "failed"; error: FeedbackError }
  | { type: "cancelled" }
  | { type: "reset"; text: string };

export type EnhancementOutcome =
  | { status: "completed"; text: string }
  | { status: "failed"; error: FeedbackError }
  | { status: "cancelled" }
  | { status: "ignored"; reason: "already_running" };

export type EnhancementOrchestratorOptions = {
  capability: RewriteCapability;
  buffer: TextBuffer;
  systemInstruction: string;
  streaming: boolean;
};

type ActiveRun = {
  controller: AbortController;
  snapshot: string;
  accumulated: string;
  errorChunk: string | null;
  cancelled: boolean;
};

/**
 * Drives one rewrite at a time against the capability. Every chunk overwrites
 * the buffer with the rewrite so far; any failure or cancellation puts the
 * pre-enhancement text back.
 */
export class EnhancementOrchestrator {
  private active: ActiveRun | null = null;
  private restorableText: string | null = null;
  private readonly listeners = new Set<(event: EnhancementEvent) => void>();

  constructor(private readonly options: EnhancementOrchestratorOptions) {}

  isRunning(): boolean {
    return this.active !== null;
  }

  isAvailable(): boolean {
    return this.options.capability.isAvailable();
  }

  session(): EnhancementSession | null {
    if (!this.active) {
      return null;
    }
    return {
      originalText: this.active.snapshot,
      accumulatedText: this.active.accumulated,
      isRunning: true,
    };
  }

  canReset(): boolean {
    return this.active === null && this.restorableText !== null;
  }

  subscribe(listener: (event: EnhancementEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async enhance(contextInfo = ""): Promise<EnhancementOutcome> {
    if (this.active) {
      return { status: "ignored", reason: "already_running" };
    }

    const { buffer, capability } = this.options;
    const snapshot = buffer.getText();
    const originalText = snapshot.trim();
    if (!originalText) {
      return this.fail(new EmptyInputError());
    }
    if (!capability.isAvailable()) {
      return this.fail(
        new ServiceUnavailableError(capability.unavailableReason() ?? "prompt enhancement is unavailable"),
      );
    }

    const run: ActiveRun = {
      controller: new AbortController(),
      snapshot,
      accumulated: "",
      errorChunk: null,
      cancelled: false,
    };
    this.active = run;
    this.restorableText = null;
    this.emit({ type: "started", originalText });
    buffer.setText("");

    const request: RewriteRequest = {
      systemInstruction: this.options.systemInstruction,
      userContent: buildRewriteUserContent(originalText, contextInfo),
      signal: run.controller.signal,
    };
    const sink = (chunk: string) => this.applyChunk(run, chunk);

    let thrown: unknown = null;
    try {
      if (this.options.streaming) {
        await capability.streamRewrite(request, sink);
      } else {
        sink(await capability.rewrite(request));
      }
    } catch (error) {
      thrown = error;
    }

    if (run.cancelled) {
      return { status: "cancelled" };
    }
    this.active = null;

    if (run.errorChunk !== null) {
      return this.abandon(run, new UpstreamError(run.errorChunk.trim(), { reason: "error_chunk" }));
    }
    if (thrown !== null) {
      return this.abandon(
        run,
        isFeedbackError(thrown) ? thrown : new UpstreamError(`prompt enhancement failed: ${errorMessage(thrown)}`),
      );
    }
    if (!run.accumulated) {
      return this.abandon(run, new EmptyResponseError());
    }

    this.restorableText = run.snapshot;
    log(`enhancement completed (${run.accumulated.length} chars)`);
    this.emit({ type: "completed", text: run.accumulated });
    return { status: "completed", text: run.accumulated };
  }

  /** Stops the in-flight rewrite, if any, and restores the text it replaced. */
  cancel(): boolean {
    const run = this.active;
    if (!run) {
      return false;
    }
    run.cancelled = true;
    run.controller.abort();
    this.active = null;
    this.options.buffer.setText(run.snapshot);
    log("enhancement cancelled");
    this.emit({ type: "cancelled" });
    return true;
  }

  /** Puts back the text from before the last completed enhancement. */
  reset(): boolean {
    if (!this.canReset() || this.restorableText === null) {
      return false;
    }
    const text = this.restorableText;
    this.restorableText = null;
    this.options.buffer.setText(text);
    this.emit({ type: "reset", text });
    return true;
  }

  private applyChunk(run: ActiveRun, chunk: string): void {
    if (run.cancelled || run.errorChunk !== null || !chunk) {
      return;
    }
    if (isErrorChunk(chunk)) {
      run.errorChunk = chunk;
      run.controller.abort();
      return;
    }
    run.accumulated += chunk;
    this.options.buffer.setText(run.accumulated);
    this.emit({ type: "chunk", chunk, accumulatedText: run.accumulated });
  }

  private abandon(run: ActiveRun, error: FeedbackError): EnhancementOutcome {
    this.options.buffer.setText(run.snapshot);
    return this.fail(error);
  }

  private fail(error: FeedbackError): EnhancementOutcome {
    log(`enhancement failed: ${error.code}: ${error.message}`);
    this.emit({ type: "failed", error });
    return { status: "failed", error };
  }

  private emit(event: EnhancementEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
