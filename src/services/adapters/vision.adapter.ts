import { z } from "zod";
import { logger } from "../../utils/logger";
import { TimeoutExceededError } from "../../utils/timeout";
import { LOG_MESSAGES, LOG_SOURCES } from "../../constants/log";
import { PIPELINE_DEFAULTS } from "../../constants/pipeline";
import { VISION_MIME_TYPES } from "../../constants/vision";
import { ExtractionErrors, PipelineErrors } from "../../errors";
import { Line, LineCorpus, Resource } from "../../types/menu.types";
import { VisionCapability, VisionRequest, VisionResponse } from "../../types/vision.types";
import { pdfReader, PdfReader } from "../pdf-reader.service";
import { pageRasterizer, PageRasterizer } from "../page-rasterizer";
import { AdapterContext, StrategyAdapter } from "./adapter.types";
import { linesFromText, toResourceRef } from "./lines";

export type VisionSourceKind = "pdf" | "image";

export interface VisionAdapterOptions {
  kind: VisionSourceKind;
  timeoutMs?: number;
  reader?: PdfReader;
  rasterizer?: PageRasterizer;
}

const optionalText = z
  .string()
  .nullish()
  .transform(value => value?.trim() || undefined);

const VisionItemSchema = z.object({
  name: z.string().trim().min(1),
  description: optionalText,
  price: z
    .union([z.string(), z.number()])
    .nullish()
    .transform(value => {
      if (typeof value === "number") {
        return Number.isInteger(value) ? String(value) : value.toFixed(2);
      }
      return value?.trim() || undefined;
    }),
  section: optionalText
});

/** Lines for one vision response; structured items become pre-parsed lines. */
export function linesFromVision(response: VisionResponse, page: number | undefined, url: string): Line[] {
  if (response.kind === "text") {
    return linesFromText(response.text, page);
  }

  const lines: Line[] = [];
  let dropped = 0;

  for (const candidate of response.items) {
    const parsed = VisionItemSchema.safeParse(candidate);
    if (!parsed.success) {
      dropped++;
      continue;
    }
    const { name, description, price, section } = parsed.data;
    lines.push({
      text: name,
      ...(page !== undefined ? { page } : {}),
      preParsed: {
        name,
        ...(description ? { description } : {}),
        ...(price ? { price } : {}),
        ...(section ? { section } : {})
      }
    });
  }

  if (dropped > 0) {
    logger.warn(LOG_SOURCES.VISION, LOG_MESSAGES.VISION_ITEMS_DROPPED, { url, page, dropped });
  }

  return lines;
}

/**
 * PdfImage and RawImage strategies. A PDF is read page by page through the
 * rasterizer; an image goes to the capability as it is.
 */
export class VisionAdapter implements StrategyAdapter {
  private readonly timeoutMs: number;
  private readonly reader: PdfReader;
  private readonly rasterizer: PageRasterizer;

  constructor(private readonly vision: VisionCapability, private readonly options: VisionAdapterOptions) {
    this.timeoutMs = options.timeoutMs ?? PIPELINE_DEFAULTS.VISION_TIMEOUT_MS;
    this.reader = options.reader ?? pdfReader;
    this.rasterizer = options.rasterizer ?? pageRasterizer;
  }

  async toLineCorpus(resource: Resource, context: AdapterContext): Promise<LineCorpus> {
    const lines =
      this.options.kind === "pdf"
        ? await this.linesFromPdf(resource, context)
        : await this.linesFromImage(resource, context);

    logger.info(LOG_SOURCES.VISION, LOG_MESSAGES.CORPUS_BUILT, { url: resource.url, lines: lines.length });

    return { source: toResourceRef(resource, context.contentType), lines };
  }

  private async linesFromPdf(resource: Resource, context: AdapterContext): Promise<Line[]> {
    const pageCount = await this.countPages(resource);
    const lines: Line[] = [];

    for (let page = 1; page <= pageCount; page++) {
      if (context.signal?.aborted) {
        throw new PipelineErrors.RunAbortedError({ url: resource.url, page });
      }
      const request = await this.rasterizer.render(resource.bytes, page);
      logger.debug(LOG_SOURCES.VISION, LOG_MESSAGES.PAGE_RENDERED, { url: resource.url, page, of: pageCount });

      const response = await this.callVision(request, resource.url, "PdfImage", context.signal);
      lines.push(...linesFromVision(response, page, resource.url), { text: "", page });
    }

    return lines;
  }

  private async linesFromImage(resource: Resource, context: AdapterContext): Promise<Line[]> {
    const mimeType = context.contentType.startsWith("image/") ? context.contentType : VISION_MIME_TYPES.PNG;
    const response = await this.callVision({ data: resource.bytes, mimeType }, resource.url, "RawImage", context.signal);
    return linesFromVision(response, undefined, resource.url);
  }

  private async countPages(resource: Resource): Promise<number> {
    try {
      const pdf = await this.reader.read(resource.bytes);
      return pdf.pages.length;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn(LOG_SOURCES.PDF, LOG_MESSAGES.PDF_PARSE_FAILED, { url: resource.url, reason });
      throw new ExtractionErrors.SourceUnreadableError({ url: resource.url, strategy: "PdfImage", reason });
    }
  }

  private async callVision(
    request: VisionRequest,
    url: string,
    strategy: string,
    signal: AbortSignal | undefined
  ): Promise<VisionResponse> {
    try {
      return await this.vision.extract(request, { timeoutMs: this.timeoutMs, signal });
    } catch (error) {
      if (error instanceof PipelineErrors.RunAbortedError) {
        throw new PipelineErrors.RunAbortedError({ url, page: request.pageNumber });
      }
      const meta = { url, strategy, page: request.pageNumber };
      if (error instanceof TimeoutExceededError) {
        throw new ExtractionErrors.TimeoutError({ ...meta, timeoutMs: error.timeoutMs });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ExtractionErrors.CapabilityFailedError({ ...meta, reason });
    }
  }
}
