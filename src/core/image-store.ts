import type { ImagePayload } from "../feedback-types.js";

export type ImageStoreOptions = {
  enabled: boolean;
  /** 0 or less means no limit. */
  maxImages: number;
};

export type ImageStoreChange =
  | { kind: "added"; index: number }
  | { kind: "removed"; index: number }
  | { kind: "cleared"; count: number };

export type ImageStoreListener = (change: ImageStoreChange, revision: number) => void;

export type ImageAddResult = { ok: true; index: number } | { ok: false; error: string };

export class ImageAttachmentStore {
  private readonly images: ImagePayload[] = [];
  private readonly listeners = new Set<ImageStoreListener>();
  private revisionCounter = 0;

  constructor(private readonly options: ImageStoreOptions) {}

  get enabled(): boolean {
    return this.options.enabled;
  }

  get size(): number {
    return this.images.length;
  }

  /** Bumped on every mutation that changed the list; previews key on it. */
  get revision(): number {
    return this.revisionCounter;
  }

  add(payload: ImagePayload): ImageAddResult {
    if (!this.options.enabled) {
      return { ok: false, error: "image collection is disabled for this session" };
    }
    if (this.options.maxImages > 0 && this.images.length >= this.options.maxImages) {
      return { ok: false, error: `image limit reached (${this.options.maxImages})` };
    }

    this.images.push(Object.freeze({ ...payload }));
    const index = this.images.length - 1;
    this.emit({ kind: "added", index });
    return { ok: true, index };
  }

  removeAt(index: number): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this.images.length) {
      return false;
    }
    this.images.splice(index, 1);
    this.emit({ kind: "removed", index });
    return true;
  }

  clear(): void {
    const count = this.images.length;
    this.images.length = 0;
    this.emit({ kind: "cleared", count });
  }

  toOrderedList(): ImagePayload[] {
    return this.images.map((image) => ({ ...image }));
  }

  subscribe(listener: ImageStoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(change: ImageStoreChange): void {
    this.revisionCounter += 1;
    for (const listener of this.listeners) {
      listener(change, this.revisionCounter);
    }
  }
}
