import { logger } from "../utils/logger";
import { LOG_MESSAGES, LOG_SOURCES } from "../constants/log";
import { ADDON_SECTION_PATTERN, DEFAULT_BOILERPLATE, PARSER_LIMITS } from "../constants/pipeline";
import { Line, LineCorpus, PreParsedFields, RawItem, ResourceRef } from "../types/menu.types";
import { isAddonText, PriceTail, splitPriceTail } from "../utils/price-text";
import { collapseWhitespace, countWords, hasLetters, isAllCaps } from "../utils/text";

export interface ParseOptions {
  /** Restaurant-specific boilerplate phrases, matched case-insensitively. */
  readonly denylist?: readonly string[];
}

type DraftItem = {
  name: string;
  descriptionParts: string[];
  fragments: string[];
  sectionHint?: string;
};

type LineKind = "blank" | "boilerplate" | "content";

const PAGE_LABEL_PATTERN = /^(?:page\s+\d{1,3}(?:\s+of\s+\d{1,3})?|\d{1,3}\s+of\s+\d{1,3}|[-–—]\s*\d{1,3}\s*[-–—])$/i;
const BARE_NUMBER_PATTERN = /^\d{1,3}$/;
const LEADING_BULLET = /^[+•·*-]\s*/;

/**
 * Walks a line corpus top to bottom and groups lines into raw items.
 * One parser serves every strategy; adapters only differ in the lines they emit.
 */
export class ItemParserService {
  parse(corpus: LineCorpus, options: ParseOptions = {}): RawItem[] {
    const state = new ParseRun(corpus, options);
    const items = state.run();

    logger.info(LOG_SOURCES.PARSER, LOG_MESSAGES.ITEMS_PARSED, {
      url: corpus.source.url,
      lines: corpus.lines.length,
      items: items.length
    });

    return items;
  }
}

class ParseRun {
  private readonly lines: readonly Line[];
  private readonly texts: string[];
  private readonly kinds: LineKind[];
  private readonly medianFontSize?: number;
  private readonly items: RawItem[] = [];
  private current: DraftItem | null = null;
  private section?: string;

  constructor(private readonly corpus: LineCorpus, options: ParseOptions) {
    const denylist = [...DEFAULT_BOILERPLATE, ...(options.denylist ?? [])].map(phrase => phrase.toLowerCase());
    this.lines = corpus.lines;
    this.texts = corpus.lines.map(line => collapseWhitespace(line.text));
    this.kinds = this.texts.map((text, index) => {
      if (!text && !this.lines[index].preParsed) {
        return "blank";
      }
      return this.isBoilerplate(text, index, denylist) ? "boilerplate" : "content";
    });
    this.medianFontSize = median(
      corpus.lines
        .map(line => line.style?.fontSize)
        .filter((size): size is number => typeof size === "number" && size > 0)
    );
  }

  run(): RawItem[] {
    for (let index = 0; index < this.lines.length; index++) {
      const line = this.lines[index];
      if (line.preParsed) {
        this.closeItem();
        this.emitPreParsed(line.preParsed);
        continue;
      }
      if (this.kinds[index] !== "content") {
        this.closeItem();
        continue;
      }
      this.consume(index);
    }
    this.closeItem();
    return this.items;
  }

  private consume(index: number): void {
    const text = this.texts[index];
    const tail = splitPriceTail(text);

    if (tail && !tail.head) {
      // Price-only line, e.g. "14.00" or "Cup 5"
      this.current?.fragments.push(...tail.fragments);
      return;
    }

    if (tail && isAddonText(text)) {
      this.consumeAddon(tail);
      return;
    }

    // An open item still waiting for its price keeps the lines below it
    const awaitingPrice = this.current !== null && this.current.fragments.length === 0;

    if (tail && awaitingPrice && !this.hasOwnName(tail.head)) {
      this.current?.descriptionParts.push(stripBullet(tail.head));
      this.current?.fragments.push(...tail.fragments);
      return;
    }

    if (tail) {
      this.openItem(stripBullet(tail.head), [...tail.fragments]);
      return;
    }

    if (this.isHeaderShaped(index)) {
      if (this.priceFollowsHeader(index)) {
        this.openItem(stripBullet(text), []);
      } else {
        this.closeItem();
        this.section = text.replace(/:$/, "").trim();
      }
      return;
    }

    if (!awaitingPrice && this.isNameLike(text) && this.priceFollows(index)) {
      this.openItem(stripBullet(text), []);
      return;
    }

    this.current?.descriptionParts.push(text);
  }

  private consumeAddon(tail: PriceTail): void {
    const inAddonSection = this.section !== undefined && ADDON_SECTION_PATTERN.test(this.section);
    if (inAddonSection || !this.current) {
      this.openItem(stripBullet(tail.head), [...tail.fragments]);
      return;
    }
    const [first, ...rest] = tail.fragments;
    this.current.fragments.push(`${tail.head} ${first}`, ...rest);
  }

  private emitPreParsed(fields: PreParsedFields): void {
    if (fields.section) {
      this.section = collapseWhitespace(fields.section);
    }
    const name = collapseWhitespace(fields.name);
    if (!name) {
      return;
    }
    const description = fields.description ? collapseWhitespace(fields.description) : "";
    this.items.push(
      buildItem(this.corpus.source, {
        name,
        descriptionParts: description ? [description] : [],
        fragments: preParsedFragments(fields.price),
        sectionHint: this.section
      })
    );
  }

  private openItem(name: string, fragments: string[]): void {
    this.closeItem();
    this.current = { name, descriptionParts: [], fragments, sectionHint: this.section };
  }

  private closeItem(): void {
    if (this.current && this.current.name) {
      this.items.push(buildItem(this.corpus.source, this.current));
    }
    this.current = null;
  }

  private isBoilerplate(text: string, index: number, denylist: readonly string[]): boolean {
    const lower = text.toLowerCase();
    if (denylist.some(phrase => lower.includes(phrase))) {
      return true;
    }
    if (PAGE_LABEL_PATTERN.test(text)) {
      return true;
    }
    // A bare number only reads as a page number at the edge of its page
    return BARE_NUMBER_PATTERN.test(text) && this.isPageEdge(index);
  }

  private isPageEdge(index: number): boolean {
    const page = this.lines[index].page;
    if (page === undefined) {
      return false;
    }
    const previous = this.lines[index - 1];
    const next = this.lines[index + 1];
    return previous === undefined || previous.page !== page || next === undefined || next.page !== page;
  }

  private isPriceOnly(index: number): boolean {
    if (this.kinds[index] !== "content" || this.lines[index].preParsed) {
      return false;
    }
    const tail = splitPriceTail(this.texts[index]);
    return tail !== null && !tail.head;
  }

  /** Content lines after `index`, stopping at the first blank or boilerplate line. */
  private lookahead(index: number, count: number): number[] {
    const found: number[] = [];
    for (let next = index + 1; next < this.lines.length && found.length < count; next++) {
      if (this.kinds[next] !== "content" || this.lines[next].preParsed) {
        break;
      }
      found.push(next);
    }
    return found;
  }

  private isHeaderShaped(index: number): boolean {
    const text = this.texts[index];
    if (!hasLetters(text) || countWords(text) > PARSER_LIMITS.MAX_HEADER_WORDS) {
      return false;
    }
    const fontSize = this.lines[index].style?.fontSize;
    const outsized =
      fontSize !== undefined &&
      this.medianFontSize !== undefined &&
      fontSize >= this.medianFontSize * PARSER_LIMITS.HEADER_FONT_RATIO;
    return outsized || isAllCaps(text) || text.endsWith(":");
  }

  private priceFollowsHeader(index: number): boolean {
    const [next, afterNext] = this.lookahead(index, 2);
    if (next === undefined) {
      return false;
    }
    if (this.isPriceOnly(next)) {
      return true;
    }
    if (!this.texts[index].endsWith(":") && this.isDescribedPrice(next)) {
      return true;
    }
    return /^\p{Ll}/u.test(this.texts[next]) && afterNext !== undefined && this.isPriceOnly(afterNext);
  }

  private isNameLike(text: string): boolean {
    return (
      countWords(text) <= PARSER_LIMITS.MAX_NAME_WORDS &&
      text.length <= PARSER_LIMITS.MAX_NAME_LENGTH &&
      /^[\p{Lu}\d]/u.test(text) &&
      !/[,;.]$/.test(text)
    );
  }

  /** A name of its own: short, capitalised and not a comma-separated list. */
  private hasOwnName(head: string): boolean {
    const name = stripBullet(head);
    return this.isNameLike(name) && !name.includes(",");
  }

  /** A line such as "romaine, parmesan, croutons 9" that prices the name above it. */
  private isDescribedPrice(index: number): boolean {
    if (this.kinds[index] !== "content" || this.lines[index].preParsed) {
      return false;
    }
    const text = this.texts[index];
    const tail = splitPriceTail(text);
    return tail !== null && Boolean(tail.head) && !isAddonText(text) && !this.hasOwnName(tail.head);
  }

  private priceFollows(index: number): boolean {
    for (const next of this.lookahead(index, PARSER_LIMITS.PRICE_LOOKAHEAD)) {
      if (this.isPriceOnly(next) || this.isDescribedPrice(next)) {
        return true;
      }
      if (splitPriceTail(this.texts[next])) {
        return false;
      }
    }
    return false;
  }
}

function buildItem(source: ResourceRef, draft: DraftItem): RawItem {
  const description = draft.descriptionParts.join(" ");
  return {
    name: draft.name,
    ...(description ? { description } : {}),
    priceFragments: [...draft.fragments],
    ...(draft.sectionHint ? { sectionHint: draft.sectionHint } : {}),
    source
  };
}

function preParsedFragments(price: string | undefined): string[] {
  const raw = price ? collapseWhitespace(price) : "";
  if (!raw) {
    return [];
  }
  const tail = splitPriceTail(raw);
  return tail && !tail.head ? [...tail.fragments] : [raw];
}

function stripBullet(name: string): string {
  return name.replace(LEADING_BULLET, "").trim();
}

function median(values: number[]): number | undefined {
  if (values.length === 0) {
    return undefined;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
}

export const itemParserService = new ItemParserService();
