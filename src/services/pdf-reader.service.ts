import PDFParser from "pdf2json";

export interface PdfTextRun {
  readonly text: string;
  readonly x: number;
  readonly y: number;
  readonly fontSize?: number;
  readonly bold: boolean;
}

export interface PdfDocument {
  /** Text runs per page, in the order the PDF stores them. */
  readonly pages: readonly (readonly PdfTextRun[])[];
}

export interface PdfReader {
  read(bytes: Buffer): Promise<PdfDocument>;
}

// Only the parts of pdf2json's output this reader consumes
interface Pdf2JsonOutput {
  Pages: Array<{
    Texts: Array<{
      x: number;
      y: number;
      R: Array<{ T: string; TS?: number[] }>;
    }>;
  }>;
}

function decodeRunText(encoded: string): string {
  try {
    return decodeURIComponent(encoded);
  } catch {
    return encoded;
  }
}

function parseFailure(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  if (error && typeof error === "object" && "parserError" in error) {
    const inner = error.parserError;
    return inner instanceof Error ? inner : new Error(String(inner));
  }
  return new Error(String(error));
}

export class Pdf2JsonReader implements PdfReader {
  read(bytes: Buffer): Promise<PdfDocument> {
    return new Promise((resolve, reject) => {
      const parser = new PDFParser();

      parser.on("pdfParser_dataError", (error: unknown) => {
        reject(parseFailure(error));
      });

      parser.on("pdfParser_dataReady", (data: Pdf2JsonOutput) => {
        const pages = data.Pages.map(page =>
          page.Texts.flatMap(text =>
            text.R.map(run => ({
              text: decodeRunText(run.T),
              x: text.x,
              y: text.y,
              fontSize: run.TS?.[1],
              bold: run.TS?.[2] === 1
            }))
          )
        );
        resolve({ pages });
      });

      parser.parseBuffer(bytes);
    });
  }
}

export const pdfReader = new Pdf2JsonReader();
