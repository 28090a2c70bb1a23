import { createHash } from "node:crypto";
import { VisionCallOptions, VisionCapability, VisionRequest, VisionResponse } from "../types/vision.types";
import { visionCacheService, VisionCacheService } from "./cache.service";

/**
 * `scope` names what else shapes the answer, such as the model and the
 * system prompt, so a change to either misses the old entries.
 */
export function visionCacheKey(request: VisionRequest, scope = ""): string {
  return createHash("sha256")
    .update(scope)
    .update("\0")
    .update(request.data)
    .update("\0")
    .update(request.mimeType)
    .update("\0")
    .update(String(request.pageNumber ?? ""))
    .update("\0")
    .update(request.instruction ?? "")
    .digest("hex");
}

/** Memoizes vision responses in the SQLite cache, keyed by request content. */
export class CachedVisionCapability implements VisionCapability {
  constructor(
    private readonly inner: VisionCapability,
    private readonly cache: VisionCacheService = visionCacheService,
    private readonly scope = ""
  ) {}

  async extract(request: VisionRequest, call?: VisionCallOptions): Promise<VisionResponse> {
    const key = visionCacheKey(request, this.scope);
    const cached = await this.cache.get(key);
    if (cached) {
      return cached;
    }

    const response = await this.inner.extract(request, call);
    await this.cache.save(key, response);
    return response;
  }
}
