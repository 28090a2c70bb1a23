import { MenuItem, PipelineResult, PriceEntry, ResourceFailure } from "../types/menu.types";
import { ExportFormat, ExtractResponse, FailureRecord, FlatMenuRecord, MenuItemRecord } from "../types/api.types";

const CURRENCY_SYMBOLS: Partial<Record<string, string>> = {
  USD: "$",
  EUR: "€",
  GBP: "£"
};

export function formatPrice(entry: PriceEntry): string {
  const symbol = CURRENCY_SYMBOLS[entry.currency] ?? `${entry.currency} `;
  const amount = `${symbol}${entry.amount.toFixed(2)}`;
  const shown = entry.isAddon ? `+${amount}` : amount;
  return entry.label ? `${entry.label} ${shown}` : shown;
}

export class ExportService {
  toRecord(item: MenuItem): MenuItemRecord {
    return {
      restaurant_name: item.restaurantName,
      restaurant_url: item.restaurantUrl,
      name: item.name,
      description: item.description ?? null,
      prices: item.prices.map(price => ({
        label: price.label ?? null,
        amount: price.amount,
        currency: price.currency,
        is_addon: price.isAddon
      })),
      price_unresolved: item.priceUnresolved,
      section: item.section ?? null,
      menu_name: item.menuName ?? null,
      location: item.location ?? null
    };
  }

  /** Flattens items into numbered rows, one per price entry. */
  toFlatRecords(items: readonly MenuItem[]): FlatMenuRecord[] {
    const rows: FlatMenuRecord[] = [];

    for (const item of items) {
      const prices = item.prices.length > 0 ? item.prices.map(formatPrice) : [""];
      for (const price of prices) {
        rows.push({
          sr_no: rows.length + 1,
          restaurant_name: item.restaurantName,
          restaurant_url: item.restaurantUrl,
          menu_name: item.menuName ?? null,
          section: item.section ?? null,
          name: item.name,
          description: item.description ?? null,
          price,
          location: item.location ?? null
        });
      }
    }

    return rows;
  }

  toFailureRecord(failure: ResourceFailure): FailureRecord {
    return {
      url: failure.url,
      content_type: failure.contentType ?? null,
      strategy: failure.strategy ?? null,
      kind: failure.kind,
      message: failure.message
    };
  }

  toResponse(result: PipelineResult, format: ExportFormat = "nested"): ExtractResponse {
    return {
      restaurant_name: result.restaurant.name,
      restaurant_url: result.restaurant.canonicalUrl,
      items: format === "flat" ? this.toFlatRecords(result.items) : result.items.map(item => this.toRecord(item)),
      failures: result.failures.map(failure => this.toFailureRecord(failure)),
      reason: result.reason
    };
  }
}

export const exportService = new ExportService();
