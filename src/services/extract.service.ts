import { z } from "zod";
import { logger } from "../utils/logger";
import { loadAppConfig } from "../utils/config";
import { ValidationErrors } from "../errors";
import { LOG_SOURCES, LOG_MESSAGES } from "../constants/log";
import { ExtractInputSchema, ResourceInputBody } from "../validators/extract.schema";
import { ExtractRequest, ExtractResponse } from "../types/api.types";
import { AppConfig } from "../types/config.types";
import { exportService, ExportService } from "./export.service";
import { FetchService } from "./fetch.service";
import { createPipeline } from "./pipeline.factory";
import { PipelineService, ResourceInput } from "./pipeline.service";

export interface ExtractServiceDependencies {
  /** Read from the environment on first use when absent. */
  config?: AppConfig;
  pipeline?: PipelineService;
  fetcher?: FetchService;
  exporter?: ExportService;
}

export class ExtractService {
  private config?: AppConfig;
  private pipeline?: PipelineService;
  private fetcher?: FetchService;
  private readonly exporter: ExportService;

  constructor(deps: ExtractServiceDependencies = {}) {
    this.config = deps.config;
    this.pipeline = deps.pipeline;
    this.fetcher = deps.fetcher;
    this.exporter = deps.exporter ?? exportService;
  }

  /**
   * Main entry point for one restaurant extraction.
   * Inline resources are decoded from base64; the rest are fetched when the pipeline reaches them.
   */
  async extract(input: ExtractRequest, signal?: AbortSignal): Promise<ExtractResponse> {
    const parsedInput = ExtractInputSchema.safeParse(input);

    if (!parsedInput.success) {
      this.mapZodErrorToCustomError(parsedInput.error);
    }

    const { restaurant, resources, format } = parsedInput.data;
    const inputs = resources.map(resource => this.toResourceInput(resource));

    const result = await this.getPipeline().run(restaurant, inputs, { signal });
    const response = this.exporter.toResponse(result, format);

    logger.info(LOG_SOURCES.EXTRACT, LOG_MESSAGES.REQUEST_SUCCESSFUL, {
      restaurant: restaurant.name,
      items: result.items.length,
      failures: result.failures.length,
      format
    });

    return response;
  }

  private getConfig(): AppConfig {
    if (!this.config) {
      this.config = loadAppConfig();
    }
    return this.config;
  }

  private getPipeline(): PipelineService {
    if (!this.pipeline) {
      this.pipeline = createPipeline(this.getConfig());
    }
    return this.pipeline;
  }

  private getFetcher(): FetchService {
    if (!this.fetcher) {
      this.fetcher = new FetchService(this.getConfig().fetchTimeoutMs);
    }
    return this.fetcher;
  }

  private toResourceInput(resource: ResourceInputBody): ResourceInput {
    const context = {
      ...(resource.hint !== undefined ? { hint: resource.hint } : {}),
      ...(resource.menuName !== undefined ? { menuName: resource.menuName } : {}),
      ...(resource.location !== undefined ? { location: resource.location } : {})
    };

    if (resource.content !== undefined) {
      return {
        bytes: Buffer.from(resource.content, "base64"),
        contentType: resource.contentType ?? "",
        url: resource.url,
        ...context
      };
    }

    return {
      url: resource.url,
      load: async () => {
        const fetched = await this.getFetcher().fetchResource({ url: resource.url, ...context });
        // A declared content type overrides whatever the server sent
        return resource.contentType ? { ...fetched, contentType: resource.contentType } : fetched;
      }
    };
  }

  /**
   * Converts Zod validation errors to our custom error classes
   */
  private mapZodErrorToCustomError(error: z.ZodError): never {
    for (const issue of error.issues) {
      const path = issue.path.join(".");

      if (path === "resources" && issue.code === "too_small") {
        throw new ValidationErrors.NoResourcesError();
      }

      if ((path === "restaurant.url" || /^resources\.\d+\.url$/.test(path)) && issue.code === "custom") {
        throw new ValidationErrors.InvalidUrlFormatError({ field: path });
      }
    }

    const first = error.issues[0];
    throw new ValidationErrors.InvalidRequestError({
      field: first?.path.join("."),
      reason: first?.message
    });
  }
}

export const extractService = new ExtractService();
