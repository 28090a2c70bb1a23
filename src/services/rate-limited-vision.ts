import { logger } from "../utils/logger";
import { LOG_MESSAGES, LOG_SOURCES } from "../constants/log";
import { PipelineErrors } from "../errors";
import { withTimeout } from "../utils/timeout";
import { VisionCallOptions, VisionCapability, VisionRequest, VisionResponse } from "../types/vision.types";

export interface RateLimitOptions {
  /** Minimum gap between the end of one call and the start of the next. */
  minDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Serializes calls to a vision capability and spaces them out. Calls made
 * concurrently are queued in arrival order. A call's timeout starts when it
 * leaves the queue, and a call whose run was aborted while queued never starts.
 */
export class RateLimitedVisionCapability implements VisionCapability {
  private queue: Promise<void> = Promise.resolve();
  private lastFinishedAt?: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(private readonly inner: VisionCapability, private readonly options: RateLimitOptions) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  extract(request: VisionRequest, options: VisionCallOptions = {}): Promise<VisionResponse> {
    const call = this.queue.then(() => this.runInSlot(request, options));
    // The next caller waits for this call to settle, whatever its outcome
    this.queue = call.then(
      () => undefined,
      () => undefined
    );
    return call;
  }

  private async runInSlot(request: VisionRequest, options: VisionCallOptions): Promise<VisionResponse> {
    if (options.signal?.aborted) {
      logger.debug(LOG_SOURCES.VISION, LOG_MESSAGES.VISION_SKIPPED, { page: request.pageNumber });
      throw new PipelineErrors.RunAbortedError({ page: request.pageNumber });
    }

    if (this.lastFinishedAt !== undefined) {
      const waitMs = this.lastFinishedAt + this.options.minDelayMs - this.now();
      if (waitMs > 0) {
        logger.debug(LOG_SOURCES.VISION, LOG_MESSAGES.VISION_WAITING, { waitMs });
        await this.sleep(waitMs);
      }
    }

    try {
      const call = this.inner.extract(request, { signal: options.signal });
      return options.timeoutMs === undefined ? await call : await withTimeout(call, options.timeoutMs);
    } finally {
      this.lastFinishedAt = this.now();
    }
  }
}
