import { PriceNormalizerService } from "../../src/services/price-normalizer.service";

describe("PriceNormalizerService", () => {
  const prices = new PriceNormalizerService();

  it("reads a dollar price", () => {
    expect(prices.normalize(["$14.00"])).toEqual([{ amount: 14, currency: "USD", isAddon: false }]);
  });

  it("keeps size labels on each entry", () => {
    expect(prices.normalize(["Small 5", "Large 8"])).toEqual([
      { label: "Small", amount: 5, currency: "USD", isAddon: false },
      { label: "Large", amount: 8, currency: "USD", isAddon: false }
    ]);
  });

  it("splits a combined size fragment", () => {
    expect(prices.normalize(["Small 8 / Large 14"])).toEqual([
      { label: "Small", amount: 8, currency: "USD", isAddon: false },
      { label: "Large", amount: 14, currency: "USD", isAddon: false }
    ]);
  });

  it("marks add-on fragments", () => {
    expect(prices.normalize(["Add chicken 4"])).toEqual([
      { label: "Add chicken", amount: 4, currency: "USD", isAddon: true }
    ]);
  });

  it("marks every entry in an add-on section", () => {
    expect(prices.normalize(["+ Avocado 2"], { sectionHint: "Add-Ons" })).toEqual([
      { label: "Avocado", amount: 2, currency: "USD", isAddon: true }
    ]);
  });

  it("reads both ends of a price range", () => {
    expect(prices.normalize(["$8.00 - $12.00"]).map(entry => entry.amount)).toEqual([8, 12]);
  });

  it("leaves market price unresolved", () => {
    expect(prices.analyze(["Market Price"])).toEqual({ entries: [], unresolvedFragments: ["Market Price"] });
  });

  it("rejects implausible bare numbers", () => {
    expect(prices.analyze(["750", "555-1234"]).unresolvedFragments).toEqual(["750", "555-1234"]);
  });

  it("accepts large amounts written with a currency symbol", () => {
    expect(prices.normalize(["$750"])).toEqual([{ amount: 750, currency: "USD", isAddon: false }]);
  });

  describe("currency", () => {
    it("maps symbols to their currencies", () => {
      expect(prices.normalize(["€9,50", "£6"]).map(entry => [entry.amount, entry.currency])).toEqual([
        [9.5, "EUR"],
        [6, "GBP"]
      ]);
    });

    it("reads written currency codes", () => {
      expect(prices.normalize(["12 CAD"])[0].currency).toBe("CAD");
    });

    it("maps the dollar sign to a dollar locale", () => {
      expect(prices.normalize(["$14"], { locale: { currency: "CAD" } })[0].currency).toBe("CAD");
    });

    it("falls back to USD for the dollar sign in a non-dollar locale", () => {
      expect(prices.normalize(["$14"], { locale: { currency: "EUR" } })[0].currency).toBe("USD");
    });

    it("uses the locale currency for bare numbers", () => {
      expect(prices.normalize(["14"], { locale: { currency: "EUR" } })[0].currency).toBe("EUR");
    });
  });
});
