import { MENU_EXTRACTION_SYSTEM_PROMPT } from "../prompts/menu-extraction.prompt";
import { AppConfig } from "../types/config.types";
import { VisionCapability } from "../types/vision.types";
import { createAdapters } from "./adapters";
import { visionCacheService, VisionCacheService } from "./cache.service";
import { CachedVisionCapability } from "./cached-vision";
import { ClassifierService } from "./classifier.service";
import { pdfReader } from "./pdf-reader.service";
import { PipelineService } from "./pipeline.service";
import { RateLimitedVisionCapability } from "./rate-limited-vision";
import { OpenAIVisionService } from "./vision.service";

export interface PipelineFactoryOptions {
  /** Replaces the OpenAI-backed capability; rate limiting and caching still wrap it. */
  vision?: VisionCapability;
  cache?: VisionCacheService;
}

/**
 * Builds the vision handle (cache over rate limiter over the service) and
 * the pipeline that uses it. Cache hits skip the rate limiter.
 */
export function createPipeline(config: AppConfig, options: PipelineFactoryOptions = {}): PipelineService {
  const base = options.vision ?? new OpenAIVisionService({ apiKey: config.openaiApiKey, model: config.visionModel });
  const limited = new RateLimitedVisionCapability(base, { minDelayMs: config.visionMinDelayMs });
  const cache = options.cache ?? visionCacheService;
  const scope = `${config.visionModel}\n${MENU_EXTRACTION_SYSTEM_PROMPT}`;
  const vision = cache.isReady() ? new CachedVisionCapability(limited, cache, scope) : limited;

  return new PipelineService({
    adapters: createAdapters({ vision, reader: pdfReader, visionTimeoutMs: config.visionTimeoutMs }),
    classifier: new ClassifierService(pdfReader, { minCharsPerPage: config.pdfMinCharsPerPage })
  });
}
