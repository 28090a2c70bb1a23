import { logger } from "../../utils/logger";
import { LOG_MESSAGES, LOG_SOURCES } from "../../constants/log";
import { ExtractionErrors } from "../../errors";
import { Line, LineCorpus, Resource } from "../../types/menu.types";
import { PdfDocument, pdfReader, PdfReader, PdfTextRun } from "../pdf-reader.service";
import { AdapterContext, StrategyAdapter } from "./adapter.types";
import { toResourceRef } from "./lines";

// pdf2json page units
const SAME_LINE_TOLERANCE = 0.3;
const INDENT_STEP = 2;

interface RunGroup {
  y: number;
  runs: PdfTextRun[];
}

function groupIntoLines(runs: readonly PdfTextRun[]): RunGroup[] {
  const sorted = runs.filter(run => run.text.trim()).sort((a, b) => a.y - b.y || a.x - b.x);
  const groups: RunGroup[] = [];

  for (const run of sorted) {
    const current = groups[groups.length - 1];
    if (current && Math.abs(run.y - current.y) <= SAME_LINE_TOLERANCE) {
      current.runs.push(run);
    } else {
      groups.push({ y: run.y, runs: [run] });
    }
  }

  return groups;
}

/** Lines for one page in reading order, with style taken from the runs. */
export function linesFromRuns(runs: readonly PdfTextRun[], page: number): Line[] {
  const groups = groupIntoLines(runs);
  if (groups.length === 0) {
    return [];
  }
  const pageLeft = Math.min(...groups.flatMap(group => group.runs.map(run => run.x)));

  return groups.map(group => {
    const ordered = [...group.runs].sort((a, b) => a.x - b.x);
    const sizes = ordered.map(run => run.fontSize).filter((size): size is number => size !== undefined);
    const text = ordered
      .map(run => run.text)
      .join(" ")
      .replace(/\s+/g, " ")
      .trim();

    return {
      text,
      page,
      style: {
        ...(sizes.length > 0 ? { fontSize: Math.max(...sizes) } : {}),
        bold: ordered.every(run => run.bold),
        indentLevel: Math.round((ordered[0].x - pageLeft) / INDENT_STEP)
      }
    };
  });
}

export class PdfTextAdapter implements StrategyAdapter {
  constructor(private readonly reader: PdfReader = pdfReader) {}

  async toLineCorpus(resource: Resource, context: AdapterContext): Promise<LineCorpus> {
    let pdf: PdfDocument;
    try {
      pdf = await this.reader.read(resource.bytes);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn(LOG_SOURCES.PDF, LOG_MESSAGES.PDF_PARSE_FAILED, { url: resource.url, reason });
      throw new ExtractionErrors.SourceUnreadableError({ url: resource.url, strategy: "PdfText", reason });
    }

    const lines = pdf.pages.flatMap((runs, index) => linesFromRuns(runs, index + 1));

    logger.info(LOG_SOURCES.PDF, LOG_MESSAGES.CORPUS_BUILT, {
      url: resource.url,
      pages: pdf.pages.length,
      lines: lines.length
    });

    return { source: toResourceRef(resource, context.contentType), lines };
  }
}
