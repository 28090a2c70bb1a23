import priceLabels from "../constants/price-labels.json";
import { PARSER_LIMITS } from "../constants/pipeline";
import { collapseWhitespace, countWords } from "./text";

export interface PriceToken {
  readonly text: string;
  readonly start: number;
  readonly end: number;
  readonly amount: number;
  /** Symbol or ISO code written next to the number, if any. */
  readonly marker?: string;
  readonly hasDecimal: boolean;
}

export interface PriceTail {
  /** Text before the price run, with dot leaders and separators removed. */
  readonly head: string;
  /** One fragment per price, each prefixed with its label when one was written. */
  readonly fragments: readonly string[];
}

const AMOUNT = String.raw`\d{1,4}(?:[.,]\d{1,2})?`;
const CODES = "USD|EUR|GBP|CAD";
const BARE_BEFORE = String.raw`(?<![\w.,$€£]|\d-)`;
const BARE_AFTER = String.raw`(?![\w%]|[.,]\d|-\d)`;

const PREFIXED = String.raw`(?<![\w.,])(?:[$€£]|(?:${CODES})\s?)\s?${AMOUNT}(?![\w%]|[.,]\d)`;
const SUFFIXED = String.raw`${BARE_BEFORE}${AMOUNT}\s?(?:[$€£]|(?:${CODES})\b)`;
const BARE_DECIMAL = String.raw`${BARE_BEFORE}\d{1,4}[.,]\d{2}${BARE_AFTER}`;
const BARE_INTEGER = String.raw`${BARE_BEFORE}\d{1,3}${BARE_AFTER}`;

const PRICE_TOKEN_PATTERN = new RegExp(`${PREFIXED}|${SUFFIXED}|${BARE_DECIMAL}|${BARE_INTEGER}`, "g");
const MARKER_PATTERN = new RegExp(`[$€£]|${CODES}`);

const GAP_PATTERN = /^\s*([/|,;•·–—-]|\bor\b)?\s*(.*?)\s*$/iu;
const LABEL_SHAPE = /^\+?\s*\p{L}[\p{L}'’&.\s-]*$/u;
const TRAILING_SEPARATORS = /[\s.·…_:|/–—-]+$/u;
const TRAILING_AFTER_PRICE = /^[\s.)*]*$/;
const ADDON_PREFIX = /^(\+|add\b)/i;

const SIZE_LABELS = new Set(priceLabels.sizes.map(label => label.toLowerCase()));

function normalizeLabel(label: string): string {
  return collapseWhitespace(label).toLowerCase().replace(/[.:]+$/, "");
}

export function isSizeLabel(text: string): boolean {
  return SIZE_LABELS.has(normalizeLabel(text));
}

export function isAddonText(text: string): boolean {
  return ADDON_PREFIX.test(text.trim());
}

function parseAmount(text: string): number {
  const numeric = text.replace(/[^\d.,]/g, "").replace(",", ".");
  return Math.round(parseFloat(numeric) * 100) / 100;
}

/** Every price-shaped token in the text, in reading order. */
export function findPriceTokens(text: string): PriceToken[] {
  const tokens: PriceToken[] = [];
  for (const match of text.matchAll(PRICE_TOKEN_PATTERN)) {
    const raw = match[0];
    const start = match.index ?? 0;
    const marker = raw.match(MARKER_PATTERN)?.[0];
    tokens.push({
      text: raw.trim(),
      start,
      end: start + raw.length,
      amount: parseAmount(raw),
      marker,
      hasDecimal: /[.,]\d/.test(raw)
    });
  }
  return tokens;
}

function acceptsGapLabel(delimiter: string | undefined, label: string): boolean {
  if (!label) {
    return true;
  }
  if (countWords(label) > PARSER_LIMITS.MAX_LABEL_WORDS || !LABEL_SHAPE.test(label)) {
    return false;
  }
  return delimiter !== undefined || isSizeLabel(label) || isAddonText(label);
}

/**
 * Splits a trailing run of prices off a line: "Soup  Small 5 / Large 8" gives
 * head "Soup" and fragments ["Small 5", "Large 8"]. Returns null when the line
 * does not end in a price.
 */
export function splitPriceTail(text: string): PriceTail | null {
  const tokens = findPriceTokens(text);
  if (tokens.length === 0) {
    return null;
  }

  const last = tokens[tokens.length - 1];
  if (!TRAILING_AFTER_PRICE.test(text.slice(last.end))) {
    return null;
  }

  const labels = new Map<number, string>();
  let first = tokens.length - 1;
  while (first > 0) {
    const gap = text.slice(tokens[first - 1].end, tokens[first].start);
    const match = gap.match(GAP_PATTERN);
    if (!match) {
      break;
    }
    const [, delimiter, label] = match;
    if (!acceptsGapLabel(delimiter, label)) {
      break;
    }
    if (label) {
      labels.set(first, label);
    }
    first--;
  }

  let head = collapseWhitespace(text.slice(0, tokens[first].start));
  if (head && isSizeLabel(head)) {
    labels.set(first, head);
    head = "";
  } else if (head && first < tokens.length - 1) {
    const words = head.split(" ");
    for (const take of [2, 1]) {
      if (words.length <= take) {
        continue;
      }
      const candidate = words.slice(-take).join(" ");
      if (isSizeLabel(candidate)) {
        labels.set(first, candidate);
        head = words.slice(0, -take).join(" ");
        break;
      }
    }
  }

  const fragments = tokens.slice(first).map((token, offset) => {
    const label = labels.get(first + offset);
    return label ? `${label} ${token.text}` : token.text;
  });

  return {
    head: head.replace(TRAILING_SEPARATORS, ""),
    fragments
  };
}
