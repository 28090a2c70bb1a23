export type Strategy = "HtmlStructured" | "PdfText" | "PdfImage" | "RawImage";

/**
 * One fetched source document. Produced by the fetch layer and consumed once by
 * the classifier; the bytes are not kept past the document's processing.
 */
export interface Resource {
  readonly bytes: Buffer;
  readonly contentType: string;
  readonly url: string;
  /** Free-form hint such as "wine list" or "kids menu". */
  readonly hint?: string;
  readonly menuName?: string;
  readonly location?: string;
}

/** Resource identity without its bytes, carried by every record derived from it. */
export interface ResourceRef {
  readonly url: string;
  readonly contentType: string;
  readonly hint?: string;
  readonly menuName?: string;
  readonly location?: string;
}

export interface StyleHints {
  readonly fontSize?: number;
  readonly bold?: boolean;
  readonly indentLevel?: number;
}

/** Fields already segmented by the vision capability or by site selectors. */
export interface PreParsedFields {
  readonly name: string;
  readonly description?: string;
  readonly price?: string;
  readonly section?: string;
}

export interface Line {
  readonly text: string;
  readonly style?: StyleHints;
  readonly page?: number;
  readonly preParsed?: PreParsedFields;
}

export interface LineCorpus {
  readonly source: ResourceRef;
  readonly lines: readonly Line[];
}

export interface RawItem {
  readonly name: string;
  readonly description?: string;
  readonly priceFragments: readonly string[];
  readonly sectionHint?: string;
  readonly source: ResourceRef;
}

export interface PriceEntry {
  readonly label?: string;
  readonly amount: number;
  readonly currency: string;
  readonly isAddon: boolean;
}

export interface MenuItem {
  readonly restaurantName: string;
  readonly restaurantUrl: string;
  readonly name: string;
  readonly description?: string;
  readonly prices: readonly PriceEntry[];
  readonly priceUnresolved: boolean;
  readonly section?: string;
  readonly menuName?: string;
  readonly location?: string;
}

export interface Restaurant {
  readonly name: string;
  readonly canonicalUrl: string;
  readonly location?: string;
}

export type FailureKind = "fetch" | "unreadable" | "capability" | "timeout" | "unexpected";

export interface ResourceFailure {
  readonly url: string;
  readonly contentType?: string;
  readonly strategy?: Strategy;
  readonly kind: FailureKind;
  readonly message: string;
}

export interface PipelineResult {
  readonly restaurant: Restaurant;
  readonly items: readonly MenuItem[];
  readonly failures: readonly ResourceFailure[];
  /** Set only when no item was produced. */
  readonly reason: string | null;
}
