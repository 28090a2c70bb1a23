import { LineCorpus, Resource, Strategy } from "../../types/menu.types";
import { SelectorHints } from "../../types/config.types";

export interface AdapterContext {
  /** Content type the classifier settled on. */
  readonly contentType: string;
  readonly selectorHints?: SelectorHints;
  readonly signal?: AbortSignal;
}

/**
 * Turns one resource into a line corpus. An empty corpus means nothing was
 * found; an unusable source raises an ExtractionFailure.
 */
export interface StrategyAdapter {
  toLineCorpus(resource: Resource, context: AdapterContext): Promise<LineCorpus>;
}

export type AdapterRegistry = Readonly<Record<Strategy, StrategyAdapter>>;
