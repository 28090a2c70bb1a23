import { ExtractInput, ResourceInputBody } from "../validators/extract.schema";
import { FailureKind, Strategy } from "./menu.types";

export type ExtractRequest = ExtractInput;

export type { ResourceInputBody };

export type ExportFormat = "nested" | "flat";

export interface PriceRecord {
  label: string | null;
  amount: number;
  currency: string;
  is_addon: boolean;
}

export interface MenuItemRecord {
  restaurant_name: string;
  restaurant_url: string;
  name: string;
  description: string | null;
  prices: PriceRecord[];
  price_unresolved: boolean;
  section: string | null;
  menu_name: string | null;
  location: string | null;
}

/** One row per price; an item without a resolved price gets one row with an empty price. */
export interface FlatMenuRecord {
  sr_no: number;
  restaurant_name: string;
  restaurant_url: string;
  menu_name: string | null;
  section: string | null;
  name: string;
  description: string | null;
  price: string;
  location: string | null;
}

export interface FailureRecord {
  url: string;
  content_type: string | null;
  strategy: Strategy | null;
  kind: FailureKind;
  message: string;
}

export interface ExtractResponse {
  restaurant_name: string;
  restaurant_url: string;
  items: MenuItemRecord[] | FlatMenuRecord[];
  failures: FailureRecord[];
  reason: string | null;
}
