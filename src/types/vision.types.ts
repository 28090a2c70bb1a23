export interface VisionRequest {
  readonly data: Buffer;
  readonly mimeType: string;
  /** 1-based page to read when `data` is a whole PDF document. */
  readonly pageNumber?: number;
  readonly instruction?: string;
}

/** One loosely segmented item; any field may be missing or wrongly typed. */
export interface VisionItem {
  readonly name?: unknown;
  readonly description?: unknown;
  readonly price?: unknown;
  readonly section?: unknown;
}

export type VisionResponse =
  | { readonly kind: "structured"; readonly items: readonly VisionItem[] }
  | { readonly kind: "text"; readonly text: string };

export interface VisionCallOptions {
  /** Bounds the external call itself, from the moment it is dispatched. */
  readonly timeoutMs?: number;
  /** Aborts the run; a call still waiting for its turn is skipped. */
  readonly signal?: AbortSignal;
}

/**
 * External image/scanned-page reader. Implementations may be throttled and
 * may return malformed items; callers validate every field.
 */
export interface VisionCapability {
  extract(request: VisionRequest, call?: VisionCallOptions): Promise<VisionResponse>;
}
