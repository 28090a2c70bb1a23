import { logger } from "../utils/logger";
import { LOG_MESSAGES, LOG_SOURCES } from "../constants/log";
import { DEFAULT_BOILERPLATE } from "../constants/pipeline";
import { MenuItem, PriceEntry, RawItem, Restaurant } from "../types/menu.types";
import { PriceLocale } from "../types/config.types";
import { collapseWhitespace, hasLetters, isAllCaps, toTitleCase } from "../utils/text";
import { priceNormalizerService, PriceNormalizerService } from "./price-normalizer.service";

export interface NormalizeOptions {
  readonly denylist?: readonly string[];
  readonly locale?: PriceLocale;
}

function cleanText(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const collapsed = collapseWhitespace(value);
  return collapsed || undefined;
}

function displayCase(value: string | undefined): string | undefined {
  const cleaned = cleanText(value);
  return cleaned && isAllCaps(cleaned) ? toTitleCase(cleaned) : cleaned;
}

function dedupeKey(item: MenuItem): string {
  return JSON.stringify([item.name.toLowerCase(), item.section?.toLowerCase() ?? "", item.location?.toLowerCase() ?? ""]);
}

function isSamePrice(existing: PriceEntry, candidate: PriceEntry): boolean {
  if (existing.isAddon !== candidate.isAddon) {
    return false;
  }
  if (existing.label === undefined && candidate.label === undefined) {
    return existing.amount === candidate.amount && existing.currency === candidate.currency;
  }
  return existing.label?.toLowerCase() === candidate.label?.toLowerCase();
}

export class ItemNormalizerService {
  constructor(private readonly prices: PriceNormalizerService = priceNormalizerService) {}

  /**
   * Cleans a raw item into its output shape. Returns null when the name is
   * not a menu item name (empty, numeric, or boilerplate).
   */
  normalize(raw: RawItem, restaurant: Restaurant, options: NormalizeOptions = {}): MenuItem | null {
    const name = displayCase(raw.name);
    if (!name || !hasLetters(name) || this.isBoilerplate(name, options.denylist)) {
      logger.debug(LOG_SOURCES.NORMALIZER, LOG_MESSAGES.ITEM_REJECTED, { name: raw.name, url: raw.source.url });
      return null;
    }

    const section = displayCase(raw.sectionHint);
    const { entries, unresolvedFragments } = this.prices.analyze(raw.priceFragments, {
      sectionHint: raw.sectionHint,
      locale: options.locale
    });
    const description = cleanText(raw.description);
    const menuName = cleanText(raw.source.menuName ?? raw.source.hint);
    const location = cleanText(raw.source.location ?? restaurant.location);

    return {
      restaurantName: restaurant.name,
      restaurantUrl: restaurant.canonicalUrl,
      name,
      ...(description ? { description } : {}),
      prices: entries,
      priceUnresolved: entries.length === 0 || unresolvedFragments.length > 0,
      ...(section ? { section } : {}),
      ...(menuName ? { menuName } : {}),
      ...(location ? { location } : {})
    };
  }

  normalizeAll(raws: readonly RawItem[], restaurant: Restaurant, options: NormalizeOptions = {}): MenuItem[] {
    const items = raws
      .map(raw => this.normalize(raw, restaurant, options))
      .filter((item): item is MenuItem => item !== null);

    logger.debug(LOG_SOURCES.NORMALIZER, LOG_MESSAGES.ITEMS_NORMALIZED, {
      restaurant: restaurant.name,
      raw: raws.length,
      kept: items.length
    });

    return items;
  }

  /**
   * Merges items sharing (name, section, location), keeping first-seen order.
   * Running it twice gives the same result as running it once.
   */
  dedupe(items: readonly MenuItem[]): MenuItem[] {
    const merged = new Map<string, MenuItem>();
    for (const item of items) {
      const key = dedupeKey(item);
      const existing = merged.get(key);
      merged.set(key, existing ? this.merge(existing, item) : item);
    }

    if (merged.size < items.length) {
      logger.debug(LOG_SOURCES.NORMALIZER, LOG_MESSAGES.DUPLICATES_MERGED, {
        before: items.length,
        after: merged.size
      });
    }

    return [...merged.values()];
  }

  private merge(first: MenuItem, later: MenuItem): MenuItem {
    const prices = [...first.prices];
    for (const entry of later.prices) {
      if (!prices.some(existing => isSamePrice(existing, entry))) {
        prices.push(entry);
      }
    }

    const description =
      (later.description?.length ?? 0) > (first.description?.length ?? 0) ? later.description : first.description;

    return {
      ...first,
      ...(description ? { description } : {}),
      prices,
      priceUnresolved: prices.length === 0 || (first.priceUnresolved && later.priceUnresolved)
    };
  }

  private isBoilerplate(name: string, denylist: readonly string[] = []): boolean {
    const lower = name.toLowerCase();
    return [...DEFAULT_BOILERPLATE, ...denylist].some(phrase => lower.includes(phrase.toLowerCase()));
  }
}

export const itemNormalizerService = new ItemNormalizerService();
