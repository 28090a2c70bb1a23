import { ItemNormalizerService } from "../../src/services/item-normalizer.service";
import { MenuItem, PriceEntry, RawItem, Restaurant } from "../../src/types/menu.types";

const restaurant: Restaurant = { name: "Luigi's", canonicalUrl: "https://luigis.test", location: "Downtown" };

function raw(overrides: Partial<RawItem>): RawItem {
  return {
    name: "Margherita",
    priceFragments: [],
    source: { url: "https://luigis.test/menu", contentType: "text/html" },
    ...overrides
  };
}

function item(name: string, section: string, prices: PriceEntry[], extra: Partial<MenuItem> = {}): MenuItem {
  return {
    restaurantName: "Luigi's",
    restaurantUrl: "https://luigis.test",
    name,
    prices,
    priceUnresolved: prices.length === 0,
    section,
    ...extra
  };
}

const usd = (amount: number, label?: string, isAddon = false): PriceEntry => ({
  ...(label ? { label } : {}),
  amount,
  currency: "USD",
  isAddon
});

describe("ItemNormalizerService", () => {
  const normalizer = new ItemNormalizerService();

  describe("normalize", () => {
    it("cleans names, sections and prices", () => {
      const result = normalizer.normalize(
        raw({
          name: "  MARGHERITA   PIZZA ",
          priceFragments: ["$14.00"],
          sectionHint: "PIZZAS",
          source: { url: "https://luigis.test/menu", contentType: "text/html", menuName: "Dinner" }
        }),
        restaurant
      );

      expect(result).toEqual({
        restaurantName: "Luigi's",
        restaurantUrl: "https://luigis.test",
        name: "Margherita Pizza",
        prices: [usd(14)],
        priceUnresolved: false,
        section: "Pizzas",
        menuName: "Dinner",
        location: "Downtown"
      });
    });

    it("prefers the resource location and hint", () => {
      const result = normalizer.normalize(
        raw({
          priceFragments: ["12"],
          source: { url: "https://luigis.test/uptown", contentType: "text/html", hint: "Lunch", location: "Uptown" }
        }),
        restaurant
      );

      expect(result?.menuName).toBe("Lunch");
      expect(result?.location).toBe("Uptown");
    });

    it("flags items without a readable price", () => {
      const result = normalizer.normalize(raw({ name: "Oysters", priceFragments: ["Market Price"] }), restaurant);

      expect(result?.prices).toEqual([]);
      expect(result?.priceUnresolved).toBe(true);
    });

    it("flags items with a partly unreadable price", () => {
      const result = normalizer.normalize(raw({ priceFragments: ["12", "ask your server"] }), restaurant);

      expect(result?.prices).toEqual([usd(12)]);
      expect(result?.priceUnresolved).toBe(true);
    });

    it("rejects names that are not menu items", () => {
      expect(normalizer.normalize(raw({ name: "   " }), restaurant)).toBeNull();
      expect(normalizer.normalize(raw({ name: "1234" }), restaurant)).toBeNull();
      expect(normalizer.normalize(raw({ name: "All major credit cards accepted" }), restaurant)).toBeNull();
      expect(normalizer.normalize(raw({ name: "Gift cards" }), restaurant, { denylist: ["gift card"] })).toBeNull();
    });
  });

  describe("dedupe", () => {
    it("merges items sharing name and section", () => {
      const first = item("Soup", "Starters", [usd(5, "Small")]);
      const later = item("soup", "Starters", [usd(5, "Small"), usd(8, "Large")], {
        description: "Tomato and basil"
      });
      const other = item("Soup", "Mains", [usd(11)]);

      expect(normalizer.dedupe([first, later, other])).toEqual([
        item("Soup", "Starters", [usd(5, "Small"), usd(8, "Large")], { description: "Tomato and basil" }),
        other
      ]);
    });

    it("keeps the longer description", () => {
      const first = item("Soup", "Starters", [usd(5)], { description: "Tomato soup with basil" });
      const later = item("Soup", "Starters", [usd(5)], { description: "Tomato soup" });

      expect(normalizer.dedupe([first, later])[0].description).toBe("Tomato soup with basil");
    });

    it("does not mix add-on prices with base prices", () => {
      const base = item("Bacon", "Sides", [usd(2, "Bacon")]);
      const addon = item("Bacon", "Sides", [usd(2, "Bacon", true)]);

      expect(normalizer.dedupe([base, addon])[0].prices).toEqual([usd(2, "Bacon"), usd(2, "Bacon", true)]);
    });

    it("keeps add-on items apart from same-named base items", () => {
      const base = item("Avocado", "Sides", [usd(4)]);
      const addon = item("Avocado", "Add-Ons", [usd(2, undefined, true)]);

      expect(normalizer.dedupe([base, addon])).toEqual([base, addon]);
    });

    it("resolves a price found in a later source", () => {
      const first = item("Oysters", "Raw Bar", []);
      const later = item("Oysters", "Raw Bar", [usd(18)]);

      expect(normalizer.dedupe([first, later])[0]).toEqual(item("Oysters", "Raw Bar", [usd(18)]));
    });

    it("is idempotent", () => {
      const items = [
        item("Soup", "Starters", [usd(5, "Small")]),
        item("Soup", "Starters", [usd(8, "Large")]),
        item("Salad", "Starters", [usd(9)])
      ];
      const once = normalizer.dedupe(items);

      expect(normalizer.dedupe(once)).toEqual(once);
    });
  });
});
