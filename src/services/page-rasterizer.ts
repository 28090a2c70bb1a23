import { VISION_MIME_TYPES } from "../constants/vision";
import { VisionRequest } from "../types/vision.types";

/** Turns one page of a PDF into a request the vision capability can read. */
export interface PageRasterizer {
  render(pdf: Buffer, pageNumber: number): Promise<VisionRequest>;
}

/**
 * Sends the whole document with the page to read. Rendering happens on the
 * vision service's side; a canvas-backed rasterizer can replace this one.
 */
export class DocumentPageRasterizer implements PageRasterizer {
  async render(pdf: Buffer, pageNumber: number): Promise<VisionRequest> {
    return {
      data: pdf,
      mimeType: VISION_MIME_TYPES.PDF,
      pageNumber
    };
  }
}

export const pageRasterizer = new DocumentPageRasterizer();
