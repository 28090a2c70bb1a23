import { logger } from "../utils/logger";
import { LOG_MESSAGES, LOG_SOURCES } from "../constants/log";
import { ADDON_SECTION_PATTERN, PIPELINE_DEFAULTS, PRICE_LIMITS } from "../constants/pipeline";
import { PriceEntry } from "../types/menu.types";
import { PriceLocale } from "../types/config.types";
import { findPriceTokens, isAddonText, PriceToken, splitPriceTail } from "../utils/price-text";
import { collapseWhitespace } from "../utils/text";

export interface PriceContext {
  readonly sectionHint?: string;
  readonly locale?: PriceLocale;
}

export interface PriceAnalysis {
  readonly entries: PriceEntry[];
  /** Fragments that held no usable price, such as "Market Price". */
  readonly unresolvedFragments: string[];
}

const DOLLAR_CURRENCIES = new Set(["USD", "CAD", "AUD", "NZD"]);
const TRAILING_AFTER_PRICE = /^[\s.)*]*$/;

export class PriceNormalizerService {
  /**
   * Turns price fragments into structured entries. Fragments without a
   * plausible price produce no entry.
   */
  normalize(fragments: readonly string[], context: PriceContext = {}): PriceEntry[] {
    return this.analyze(fragments, context).entries;
  }

  analyze(fragments: readonly string[], context: PriceContext = {}): PriceAnalysis {
    const entries: PriceEntry[] = [];
    const unresolvedFragments: string[] = [];
    const addonSection = context.sectionHint !== undefined && ADDON_SECTION_PATTERN.test(context.sectionHint);
    const currency = context.locale?.currency ?? PIPELINE_DEFAULTS.CURRENCY;

    for (const fragment of fragments) {
      const resolved = this.splitFragment(fragment)
        .map(part => this.toEntry(part, addonSection, currency))
        .filter((entry): entry is PriceEntry => entry !== null);

      if (resolved.length === 0) {
        unresolvedFragments.push(fragment);
        logger.debug(LOG_SOURCES.NORMALIZER, LOG_MESSAGES.PRICE_UNRESOLVED, { fragment });
        continue;
      }
      entries.push(...resolved);
    }

    return { entries, unresolvedFragments };
  }

  // "Small 8 / Large 14" arrives as one fragment from vision output
  private splitFragment(fragment: string): string[] {
    const tail = splitPriceTail(fragment);
    if (!tail || tail.fragments.length < 2) {
      return [fragment];
    }
    const [first, ...rest] = tail.fragments;
    return [tail.head ? `${tail.head} ${first}` : first, ...rest];
  }

  private toEntry(fragment: string, addonSection: boolean, localeCurrency: string): PriceEntry | null {
    const tokens = findPriceTokens(fragment);
    if (tokens.length === 0) {
      return null;
    }

    const token = tokens[tokens.length - 1];
    if (!TRAILING_AFTER_PRICE.test(fragment.slice(token.end)) || !this.isPlausible(token)) {
      return null;
    }

    const label = this.cleanLabel(fragment.slice(0, token.start));
    return {
      ...(label ? { label } : {}),
      amount: token.amount,
      currency: this.currencyOf(token, localeCurrency),
      isAddon: addonSection || isAddonText(fragment)
    };
  }

  private isPlausible(token: PriceToken): boolean {
    if (token.amount <= 0) {
      return false;
    }
    if (token.marker !== undefined || token.hasDecimal) {
      return true;
    }
    return token.amount >= PRICE_LIMITS.MIN_BARE_AMOUNT && token.amount <= PRICE_LIMITS.MAX_BARE_AMOUNT;
  }

  private cleanLabel(raw: string): string {
    return collapseWhitespace(raw.replace(/^\s*\+\s*/, ""))
      .replace(/[\s:–—-]+$/u, "")
      .trim();
  }

  private currencyOf(token: PriceToken, localeCurrency: string): string {
    switch (token.marker) {
      case "$":
        return DOLLAR_CURRENCIES.has(localeCurrency) ? localeCurrency : "USD";
      case "€":
        return "EUR";
      case "£":
        return "GBP";
      case undefined:
        return localeCurrency;
      default:
        return token.marker;
    }
  }
}

export const priceNormalizerService = new PriceNormalizerService();
