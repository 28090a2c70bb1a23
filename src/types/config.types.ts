export interface SelectorHints {
  readonly container?: string;
  readonly section?: string;
  readonly item?: string;
  readonly name?: string;
  readonly description?: string;
  readonly price?: string;
  readonly exclude?: readonly string[];
}

export interface PriceLocale {
  readonly currency: string;
}

/** Per-restaurant settings that drive the otherwise site-agnostic pipeline. */
export interface RestaurantConfig {
  readonly name: string;
  readonly url: string;
  readonly location?: string;
  readonly selectorHints?: SelectorHints;
  readonly denylist?: readonly string[];
  readonly locale?: PriceLocale;
}

export interface AppConfig {
  readonly port: number;
  readonly openaiApiKey?: string;
  readonly visionModel: string;
  readonly visionMinDelayMs: number;
  readonly visionTimeoutMs: number;
  readonly fetchTimeoutMs: number;
  readonly pdfMinCharsPerPage: number;
  readonly cacheDbPath: string;
  readonly cacheTtlDays: number;
}
