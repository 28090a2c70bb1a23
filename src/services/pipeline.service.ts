import { logger } from "../utils/logger";
import { LOG_MESSAGES, LOG_SOURCES } from "../constants/log";
import { PIPELINE_DEFAULTS } from "../constants/pipeline";
import { BaseAppError, ExtractionFailure, FetchErrors, PipelineErrors } from "../errors";
import { FailureKind, MenuItem, PipelineResult, Resource, ResourceFailure, Restaurant, Strategy } from "../types/menu.types";
import { RestaurantConfig } from "../types/config.types";
import { AdapterRegistry } from "./adapters";
import { classifierService, ClassifierService } from "./classifier.service";
import { itemParserService, ItemParserService } from "./item-parser.service";
import { itemNormalizerService, ItemNormalizerService } from "./item-normalizer.service";

/** A resource fetched only when the pipeline reaches it. */
export interface DeferredResource {
  readonly url: string;
  load(): Promise<Resource>;
}

export type ResourceInput = Resource | DeferredResource;

export interface PipelineDependencies {
  adapters: AdapterRegistry;
  classifier?: ClassifierService;
  parser?: ItemParserService;
  normalizer?: ItemNormalizerService;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface RestaurantJob {
  restaurant: RestaurantConfig;
  resources: readonly ResourceInput[];
}

export interface RunAllOptions extends RunOptions {
  concurrency?: number;
}

export const NO_ITEMS_REASONS = {
  ALL_RESOURCES_FAILED: "all resources failed",
  NO_MENU_ITEMS: "no menu items found"
} as const;

function isDeferred(input: ResourceInput): input is DeferredResource {
  return "load" in input;
}

function failureKindOf(error: unknown): FailureKind {
  if (error instanceof ExtractionFailure) {
    return error.kind;
  }
  if (error instanceof FetchErrors.FetchFailedError || error instanceof FetchErrors.EmptyBodyError) {
    return "fetch";
  }
  return "unexpected";
}

function failureMessageOf(error: unknown): string {
  if (error instanceof BaseAppError) {
    const reason = error.meta?.reason;
    return typeof reason === "string" && reason ? `${error.message}: ${reason}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

export class PipelineService {
  private readonly adapters: AdapterRegistry;
  private readonly classifier: ClassifierService;
  private readonly parser: ItemParserService;
  private readonly normalizer: ItemNormalizerService;

  constructor(deps: PipelineDependencies) {
    this.adapters = deps.adapters;
    this.classifier = deps.classifier ?? classifierService;
    this.parser = deps.parser ?? itemParserService;
    this.normalizer = deps.normalizer ?? itemNormalizerService;
  }

  /**
   * Processes one restaurant's resources in order and returns the pooled,
   * deduplicated items. A failing resource is recorded and skipped; an abort
   * discards everything built so far.
   */
  async run(config: RestaurantConfig, resources: readonly ResourceInput[], options: RunOptions = {}): Promise<PipelineResult> {
    const restaurant: Restaurant = {
      name: config.name,
      canonicalUrl: config.url,
      ...(config.location ? { location: config.location } : {})
    };
    const pooled: MenuItem[] = [];
    const failures: ResourceFailure[] = [];

    logger.info(LOG_SOURCES.PIPELINE, LOG_MESSAGES.RUN_STARTED, {
      restaurant: restaurant.name,
      resources: resources.length
    });

    for (const input of resources) {
      this.throwIfAborted(options.signal, restaurant);

      let contentType: string | undefined;
      let strategy: Strategy | undefined;
      try {
        const resource = isDeferred(input) ? await input.load() : input;
        logger.info(LOG_SOURCES.PIPELINE, LOG_MESSAGES.RESOURCE_STARTED, { url: resource.url });

        const classification = await this.classifier.classifyDetailed(resource);
        contentType = classification.contentType;
        strategy = classification.strategy;

        const corpus = await this.adapters[strategy].toLineCorpus(resource, {
          contentType,
          selectorHints: config.selectorHints,
          signal: options.signal
        });
        const raws = this.parser.parse(corpus, { denylist: config.denylist });
        pooled.push(...this.normalizer.normalizeAll(raws, restaurant, { denylist: config.denylist, locale: config.locale }));
      } catch (error) {
        if (error instanceof PipelineErrors.RunAbortedError) {
          logger.warn(LOG_SOURCES.PIPELINE, LOG_MESSAGES.RUN_ABORTED, { restaurant: restaurant.name });
          throw error;
        }

        const failure: ResourceFailure = {
          url: input.url,
          ...(contentType !== undefined ? { contentType } : {}),
          ...(strategy !== undefined ? { strategy } : {}),
          kind: failureKindOf(error),
          message: failureMessageOf(error)
        };
        failures.push(failure);
        logger.warn(LOG_SOURCES.PIPELINE, LOG_MESSAGES.RESOURCE_FAILED, { ...failure });
      }
    }

    this.throwIfAborted(options.signal, restaurant);

    const items = this.normalizer.dedupe(pooled);
    const reason =
      items.length > 0
        ? null
        : failures.length === resources.length && resources.length > 0
          ? NO_ITEMS_REASONS.ALL_RESOURCES_FAILED
          : NO_ITEMS_REASONS.NO_MENU_ITEMS;

    logger.info(LOG_SOURCES.PIPELINE, LOG_MESSAGES.RUN_FINISHED, {
      restaurant: restaurant.name,
      items: items.length,
      failures: failures.length,
      reason
    });

    return { restaurant, items, failures, reason };
  }

  /**
   * Runs several restaurants with at most `concurrency` in flight. Each
   * restaurant still processes its own resources one at a time. Results come
   * back in job order.
   */
  async runAll(jobs: readonly RestaurantJob[], options: RunAllOptions = {}): Promise<PipelineResult[]> {
    const concurrency = Math.max(1, options.concurrency ?? PIPELINE_DEFAULTS.RESTAURANT_CONCURRENCY);
    const results = new Array<PipelineResult>(jobs.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < jobs.length) {
        const index = next++;
        const job = jobs[index];
        results[index] = await this.run(job.restaurant, job.resources, { signal: options.signal });
      }
    };

    await Promise.all(Array.from({ length: Math.min(concurrency, jobs.length) }, () => worker()));
    return results;
  }

  private throwIfAborted(signal: AbortSignal | undefined, restaurant: Restaurant): void {
    if (signal?.aborted) {
      logger.warn(LOG_SOURCES.PIPELINE, LOG_MESSAGES.RUN_ABORTED, { restaurant: restaurant.name });
      throw new PipelineErrors.RunAbortedError({ restaurant: restaurant.name });
    }
  }
}
