import { findPriceTokens, isSizeLabel, splitPriceTail } from "../../src/utils/price-text";

describe("splitPriceTail", () => {
  it("splits a dot-leader price off the item name", () => {
    expect(splitPriceTail("Margherita Pizza ....... $14.00")).toEqual({
      head: "Margherita Pizza",
      fragments: ["$14.00"]
    });
  });

  it("keeps size labels with their prices", () => {
    expect(splitPriceTail("Soup  Small 5 / Large 8")).toEqual({
      head: "Soup",
      fragments: ["Small 5", "Large 8"]
    });
  });

  it("reads undelimited size labels between prices", () => {
    expect(splitPriceTail("Wine Glass 9 Bottle 32")).toEqual({
      head: "Wine",
      fragments: ["Glass 9", "Bottle 32"]
    });
  });

  it("treats a lone size label as a price-only line", () => {
    expect(splitPriceTail("Cup 5")).toEqual({ head: "", fragments: ["Cup 5"] });
  });

  it("keeps unlabeled slash-separated prices", () => {
    expect(splitPriceTail("Pizza 12 / 18")).toEqual({ head: "Pizza", fragments: ["12", "18"] });
  });

  it("does not take a number inside the name as a price", () => {
    expect(splitPriceTail("14 inch Pizza 18")).toEqual({ head: "14 inch Pizza", fragments: ["18"] });
  });

  it("returns null for phone numbers", () => {
    expect(splitPriceTail("Call 518-555-1234")).toBeNull();
  });

  it("returns null when text follows the last price", () => {
    expect(splitPriceTail("2 eggs any style")).toBeNull();
  });
});

describe("findPriceTokens", () => {
  it("reads symbols, codes and decimal commas", () => {
    const tokens = findPriceTokens("€9,50 or 12 USD");

    expect(tokens.map(token => [token.amount, token.marker])).toEqual([
      [9.5, "€"],
      [12, "USD"]
    ]);
  });

  it("ignores four-digit bare numbers", () => {
    expect(findPriceTokens("Since 1987")).toEqual([]);
  });
});

describe("isSizeLabel", () => {
  it("matches known size words case-insensitively", () => {
    expect(isSizeLabel("LARGE")).toBe(true);
    expect(isSizeLabel("Bowl:")).toBe(true);
    expect(isSizeLabel("Chicken")).toBe(false);
  });
});
