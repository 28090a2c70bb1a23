import { VisionCapability } from "../../types/vision.types";
import { PdfReader } from "../pdf-reader.service";
import { PageRasterizer } from "../page-rasterizer";
import { AdapterRegistry } from "./adapter.types";
import { HtmlAdapter } from "./html.adapter";
import { PdfTextAdapter } from "./pdf-text.adapter";
import { VisionAdapter } from "./vision.adapter";

export type { AdapterContext, AdapterRegistry, StrategyAdapter } from "./adapter.types";
export { HtmlAdapter } from "./html.adapter";
export { PdfTextAdapter } from "./pdf-text.adapter";
export { VisionAdapter } from "./vision.adapter";

export interface AdapterDependencies {
  vision: VisionCapability;
  reader?: PdfReader;
  rasterizer?: PageRasterizer;
  visionTimeoutMs?: number;
}

export function createAdapters(deps: AdapterDependencies): AdapterRegistry {
  const visionOptions = { timeoutMs: deps.visionTimeoutMs, reader: deps.reader, rasterizer: deps.rasterizer };

  return {
    HtmlStructured: new HtmlAdapter(),
    PdfText: new PdfTextAdapter(deps.reader),
    PdfImage: new VisionAdapter(deps.vision, { kind: "pdf", ...visionOptions }),
    RawImage: new VisionAdapter(deps.vision, { kind: "image", ...visionOptions })
  };
}
