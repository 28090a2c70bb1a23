import { logger } from "../utils/logger";
import { LOG_MESSAGES, LOG_SOURCES } from "../constants/log";
import { PIPELINE_DEFAULTS } from "../constants/pipeline";
import { Resource, Strategy } from "../types/menu.types";
import { pdfReader, PdfReader } from "./pdf-reader.service";

export interface Classification {
  readonly strategy: Strategy;
  /** Normalized content type the decision was made on. */
  readonly contentType: string;
}

export interface ClassifierOptions {
  readonly minCharsPerPage?: number;
  readonly maxUndecodableRatio?: number;
}

const HTML_TYPES = new Set(["text/html", "application/xhtml+xml"]);
const PDF_TYPE = "application/pdf";
const OPAQUE_TYPES = new Set(["", "application/octet-stream", "binary/octet-stream"]);

const EXTENSION_TYPES: Record<string, string> = {
  html: "text/html",
  htm: "text/html",
  pdf: PDF_TYPE,
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  gif: "image/gif",
  webp: "image/webp"
};

// Control characters other than tab, newline and carriage return
const UNDECODABLE = /[\uFFFD\u0000-\u0008\u000B\u000C\u000E-\u001F]/g;

export function normalizeContentType(contentType: string | undefined): string {
  return (contentType ?? "").split(";")[0].trim().toLowerCase();
}

export function sniffContentType(bytes: Buffer): string | undefined {
  if (bytes.subarray(0, 4).toString("latin1") === "%PDF") {
    return PDF_TYPE;
  }
  if (bytes.length >= 8 && bytes.subarray(0, 8).equals(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))) {
    return "image/png";
  }
  if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
    return "image/jpeg";
  }
  if (bytes.subarray(0, 4).toString("latin1") === "GIF8") {
    return "image/gif";
  }
  if (bytes.subarray(0, 4).toString("latin1") === "RIFF" && bytes.subarray(8, 12).toString("latin1") === "WEBP") {
    return "image/webp";
  }
  const head = bytes.subarray(0, 512).toString("utf8").trimStart().toLowerCase();
  if (head.startsWith("<!doctype html") || head.startsWith("<html")) {
    return "text/html";
  }
  return undefined;
}

function typeFromUrl(url: string): string | undefined {
  try {
    const extension = new URL(url).pathname.split(".").pop()?.toLowerCase();
    return extension ? EXTENSION_TYPES[extension] : undefined;
  } catch {
    return undefined;
  }
}

export class ClassifierService {
  private readonly minCharsPerPage: number;
  private readonly maxUndecodableRatio: number;

  constructor(private readonly reader: PdfReader = pdfReader, options: ClassifierOptions = {}) {
    this.minCharsPerPage = options.minCharsPerPage ?? PIPELINE_DEFAULTS.MIN_CHARS_PER_PAGE;
    this.maxUndecodableRatio = options.maxUndecodableRatio ?? PIPELINE_DEFAULTS.MAX_UNDECODABLE_RATIO;
  }

  async classify(resource: Resource): Promise<Strategy> {
    return (await this.classifyDetailed(resource)).strategy;
  }

  /**
   * Picks the extraction strategy for a resource. Never throws: anything
   * unrecognized goes to the vision strategies, which accept opaque pixels.
   */
  async classifyDetailed(resource: Resource): Promise<Classification> {
    const contentType = this.resolveContentType(resource);
    const strategy = await this.decide(contentType, resource);

    logger.info(LOG_SOURCES.CLASSIFIER, LOG_MESSAGES.RESOURCE_CLASSIFIED, {
      url: resource.url,
      contentType,
      strategy
    });

    return { strategy, contentType };
  }

  private resolveContentType(resource: Resource): string {
    const declared = normalizeContentType(resource.contentType);
    if (!OPAQUE_TYPES.has(declared)) {
      return declared;
    }
    const sniffed = sniffContentType(resource.bytes) ?? typeFromUrl(resource.url);
    if (sniffed) {
      logger.debug(LOG_SOURCES.CLASSIFIER, LOG_MESSAGES.CONTENT_TYPE_SNIFFED, { url: resource.url, sniffed });
      return sniffed;
    }
    return declared;
  }

  private async decide(contentType: string, resource: Resource): Promise<Strategy> {
    if (HTML_TYPES.has(contentType)) {
      return "HtmlStructured";
    }
    if (contentType === PDF_TYPE) {
      return (await this.hasTextLayer(resource)) ? "PdfText" : "PdfImage";
    }
    if (contentType.startsWith("image/")) {
      return "RawImage";
    }
    return sniffContentType(resource.bytes) === PDF_TYPE ? "PdfImage" : "RawImage";
  }

  private async hasTextLayer(resource: Resource): Promise<boolean> {
    try {
      const document = await this.reader.read(resource.bytes);
      const pageCount = document.pages.length;
      if (pageCount === 0) {
        return false;
      }

      const text = document.pages.flatMap(page => page.map(run => run.text)).join("");
      const visible = text.replace(/\s+/g, "");
      if (visible.length / pageCount < this.minCharsPerPage) {
        return false;
      }

      const undecodable = visible.match(UNDECODABLE)?.length ?? 0;
      return undecodable / visible.length < this.maxUndecodableRatio;
    } catch (error) {
      logger.warn(LOG_SOURCES.CLASSIFIER, LOG_MESSAGES.PDF_PROBE_FAILED, { url: resource.url, error });
      return false;
    }
  }
}

export const classifierService = new ClassifierService();
