import { ReservedDirectiveError, SessionClosedError } from "../errors.js";
import type {
  FeedbackRequest,
  FeedbackResult,
  ImagePayload,
  NoticeLevel,
  PredefinedOption,
  SessionDirective,
  SessionDirectiveChoice,
  SessionNotice,
} from "../feedback-types.js";
import type { RewriteCapability } from "../enhancer/types.js";
import { createScopedLogger } from "../logging.js";
import { EnhancementOrchestrator, type EnhancementOutcome, type TextBuffer } from "./enhancement.js";
import { ImageAttachmentStore, type ImageAddResult } from "./image-store.js";
import { extractInlineImages, loadImagePayloadFromDataUrl, loadImagePayloadFromPath } from "./images.js";
import { SessionDirectiveSelector } from "./session-directive.js";
import { assembleFeedbackResult, buildClosedResult } from "./submission.js";

const log = createScopedLogger("session");

export type FeedbackSessionOptions = {
  request: FeedbackRequest;
  imagesEnabled: boolean;
  maxImages: number;
  capability: RewriteCapability;
  systemInstruction: string;
  streaming: boolean;
};

export type FeedbackSessionState = "open" | "submitted" | "closed";

export type FeedbackSessionEvent =
  | { type: "changed" }
  | { type: "notice"; notice: SessionNotice }
  | { type: "ended"; result: FeedbackResult; state: FeedbackSessionState };

export type SessionImage = {
  source: "attached" | "inline";
  image: ImagePayload;
};

/**
 * One interactive run: owns the text buffer, option checks, images and the
 * directive, and ends in exactly one FeedbackResult via submit() or close().
 */
export class FeedbackSession {
  readonly request: FeedbackRequest;
  readonly imagesEnabled: boolean;
  readonly result: Promise<FeedbackResult>;

  private text = "";
  private state: FeedbackSessionState = "open";
  private finalResult: FeedbackResult | null = null;
  private resolveResult: (result: FeedbackResult) => void = () => undefined;
  private readonly options: PredefinedOption[];
  private readonly store: ImageAttachmentStore;
  private readonly inlineImages: ImagePayload[] = [];
  private readonly maxImages: number;
  private readonly selector = new SessionDirectiveSelector();
  private readonly enhancer: EnhancementOrchestrator;
  private readonly listeners = new Set<(event: FeedbackSessionEvent) => void>();

  constructor(options: FeedbackSessionOptions) {
    this.request = options.request;
    this.imagesEnabled = options.imagesEnabled;
    this.maxImages = options.maxImages;
    this.options = options.request.predefinedOptions.map((label) => ({ label, checked: false }));
    this.store = new ImageAttachmentStore({ enabled: options.imagesEnabled, maxImages: options.maxImages });
    this.result = new Promise<FeedbackResult>((resolve) => {
      this.resolveResult = resolve;
    });

    const buffer: TextBuffer = {
      getText: () => this.text,
      setText: (text) => {
        this.text = text;
        this.emit({ type: "changed" });
      },
    };
    this.enhancer = new EnhancementOrchestrator({
      capability: options.capability,
      buffer,
      systemInstruction: options.systemInstruction,
      streaming: options.streaming,
    });
    this.enhancer.subscribe(() => this.emit({ type: "changed" }));
    this.store.subscribe(() => this.emit({ type: "changed" }));
    this.selector.subscribe(() => this.emit({ type: "changed" }));
  }

  getState(): FeedbackSessionState {
    return this.state;
  }

  isEnded(): boolean {
    return this.state !== "open";
  }

  getText(): string {
    return this.text;
  }

  /**
   * User edit of the text surface. Pasted image data urls are captured once
   * something follows them; one still at the end of the text may be a paste
   * that has not fully arrived, and waits for the next edit or submit().
   */
  setText(text: string): void {
    this.assertOpen("edit text");
    this.text = this.imagesEnabled ? this.captureInlineImages(text, true) : text;
    this.emit({ type: "changed" });
  }

  getOptions(): PredefinedOption[] {
    return this.options.map((option) => ({ ...option }));
  }

  toggleOption(index: number): boolean {
    this.assertOpen("toggle an option");
    const option = this.options[index];
    if (!option) {
      return false;
    }
    option.checked = !option.checked;
    this.emit({ type: "changed" });
    return true;
  }

  getDirective(): SessionDirective {
    return this.selector.current();
  }

  describeDirective(): string {
    return this.selector.describe();
  }

  selectDirective(choice: SessionDirectiveChoice): boolean {
    this.assertOpen("change the session directive");
    try {
      this.selector.select(choice);
      return true;
    } catch (error) {
      if (error instanceof ReservedDirectiveError) {
        this.notify("info", error.message);
        return false;
      }
      throw error;
    }
  }

  getImages(): SessionImage[] {
    return [
      ...this.store.toOrderedList().map((image) => ({ source: "attached" as const, image })),
      ...this.inlineImages.map((image) => ({ source: "inline" as const, image: { ...image } })),
    ];
  }

  imageCount(): number {
    return this.store.size + this.inlineImages.length;
  }

  addImage(image: ImagePayload): ImageAddResult {
    this.assertOpen("attach an image");
    if (this.maxImages > 0 && this.imageCount() >= this.maxImages) {
      return this.rejectImage(`image limit reached (${this.maxImages})`);
    }
    const added = this.store.add(image);
    if (!added.ok) {
      return this.rejectImage(added.error);
    }
    return added;
  }

  addImageFromPath(filePath: string): ImageAddResult {
    const loaded = loadImagePayloadFromPath(filePath);
    if (!loaded.ok) {
      return this.rejectImage(loaded.error);
    }
    return this.addImage(loaded.image);
  }

  addImageFromDataUrl(dataUrl: string): ImageAddResult {
    const loaded = loadImagePayloadFromDataUrl(dataUrl);
    if (!loaded.ok) {
      return this.rejectImage(loaded.error);
    }
    return this.addImage(loaded.image);
  }

  /** Indexes follow getImages(): attached images first, then inline ones. */
  removeImage(index: number): boolean {
    this.assertOpen("remove an image");
    if (index < this.store.size) {
      return this.store.removeAt(index);
    }
    const inlineIndex = index - this.store.size;
    if (!Number.isInteger(inlineIndex) || inlineIndex < 0 || inlineIndex >= this.inlineImages.length) {
      return false;
    }
    this.inlineImages.splice(inlineIndex, 1);
    this.emit({ type: "changed" });
    return true;
  }

  clearImages(): void {
    this.assertOpen("clear images");
    this.inlineImages.length = 0;
    this.store.clear();
  }

  isEnhancing(): boolean {
    return this.enhancer.isRunning();
  }

  isEnhancementAvailable(): boolean {
    return this.enhancer.isAvailable();
  }

  canResetEnhancement(): boolean {
    return this.enhancer.canReset();
  }

  async enhance(): Promise<EnhancementOutcome> {
    this.assertOpen("enhance the prompt");
    const outcome = await this.enhancer.enhance(this.request.contextInfo);
    if (this.isEnded()) {
      return outcome;
    }
    if (outcome.status === "completed") {
      this.notify("success", "prompt enhanced; keep editing or submit it");
    } else if (outcome.status === "failed") {
      this.notify("error", outcome.error.message);
    }
    return outcome;
  }

  cancelEnhancement(): boolean {
    return this.enhancer.cancel();
  }

  resetEnhancement(): boolean {
    this.assertOpen("reset the enhancement");
    const restored = this.enhancer.reset();
    if (restored) {
      this.notify("success", "restored the text from before enhancement");
    }
    return restored;
  }

  submit(): FeedbackResult {
    this.assertOpen("submit");
    this.enhancer.cancel();
    if (this.imagesEnabled) {
      this.text = this.captureInlineImages(this.text, false);
    }
    const result = assembleFeedbackResult({
      options: this.options,
      freeText: this.text,
      directive: this.selector.current(),
      imagesEnabled: this.imagesEnabled,
      storeImages: this.store.toOrderedList(),
      inlineImages: this.inlineImages,
    });
    this.selector.freeze();
    log(`submitted (${result.interactive_feedback.length} chars, directive=${result.session_control})`);
    return this.end("submitted", result);
  }

  /** Closing without a submission ends the run as an implicit terminate. */
  close(): FeedbackResult {
    if (this.finalResult) {
      return this.finalResult;
    }
    this.enhancer.cancel();
    this.selector.freeze();
    log("closed without submitting");
    return this.end("closed", buildClosedResult());
  }

  subscribe(listener: (event: FeedbackSessionEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private end(state: FeedbackSessionState, result: FeedbackResult): FeedbackResult {
    this.state = state;
    this.finalResult = result;
    this.resolveResult(result);
    this.emit({ type: "ended", result, state });
    return result;
  }

  private captureInlineImages(text: string, keepTrailingToken: boolean): string {
    const extraction = extractInlineImages(text, { keepTrailingToken });
    for (const image of extraction.images) {
      if (this.maxImages > 0 && this.imageCount() >= this.maxImages) {
        this.notify("error", `image limit reached (${this.maxImages})`);
        break;
      }
      this.inlineImages.push(image);
    }
    for (const error of extraction.errors) {
      this.notify("error", `pasted image skipped: ${error}`);
    }
    return extraction.text;
  }

  private rejectImage(error: string): ImageAddResult {
    this.notify("error", error);
    return { ok: false, error };
  }

  private notify(level: NoticeLevel, message: string): void {
    this.emit({ type: "notice", notice: { level, message } });
  }

  private assertOpen(operation: string): void {
    if (this.state !== "open") {
      throw new SessionClosedError(operation);
    }
  }

  private emit(event: FeedbackSessionEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
