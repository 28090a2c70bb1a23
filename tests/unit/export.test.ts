import { ExportService, formatPrice } from "../../src/services/export.service";
import { MenuItem, PipelineResult } from "../../src/types/menu.types";

const soup: MenuItem = {
  restaurantName: "Trattoria Test",
  restaurantUrl: "https://trattoria.test",
  name: "Soup",
  description: "Tomato and basil",
  prices: [
    { label: "Small", amount: 5, currency: "USD", isAddon: false },
    { label: "Large", amount: 8, currency: "USD", isAddon: false }
  ],
  priceUnresolved: false,
  section: "Starters",
  menuName: "Dinner"
};

const oysters: MenuItem = {
  restaurantName: "Trattoria Test",
  restaurantUrl: "https://trattoria.test",
  name: "Oysters",
  prices: [],
  priceUnresolved: true
};

describe("formatPrice", () => {
  it("formats amounts with their currency", () => {
    expect(formatPrice({ amount: 14, currency: "USD", isAddon: false })).toBe("$14.00");
    expect(formatPrice({ amount: 9.5, currency: "EUR", isAddon: false })).toBe("€9.50");
    expect(formatPrice({ amount: 12, currency: "CAD", isAddon: false })).toBe("CAD 12.00");
  });

  it("shows labels and add-on markers", () => {
    expect(formatPrice({ label: "Small", amount: 5, currency: "USD", isAddon: false })).toBe("Small $5.00");
    expect(formatPrice({ label: "Add chicken", amount: 4, currency: "GBP", isAddon: true })).toBe("Add chicken +£4.00");
  });
});

describe("ExportService", () => {
  const exporter = new ExportService();

  it("maps items to snake_case records", () => {
    expect(exporter.toRecord(oysters)).toEqual({
      restaurant_name: "Trattoria Test",
      restaurant_url: "https://trattoria.test",
      name: "Oysters",
      description: null,
      prices: [],
      price_unresolved: true,
      section: null,
      menu_name: null,
      location: null
    });
  });

  it("flattens one row per price and numbers the rows", () => {
    expect(exporter.toFlatRecords([soup, oysters])).toEqual([
      {
        sr_no: 1,
        restaurant_name: "Trattoria Test",
        restaurant_url: "https://trattoria.test",
        menu_name: "Dinner",
        section: "Starters",
        name: "Soup",
        description: "Tomato and basil",
        price: "Small $5.00",
        location: null
      },
      {
        sr_no: 2,
        restaurant_name: "Trattoria Test",
        restaurant_url: "https://trattoria.test",
        menu_name: "Dinner",
        section: "Starters",
        name: "Soup",
        description: "Tomato and basil",
        price: "Large $8.00",
        location: null
      },
      {
        sr_no: 3,
        restaurant_name: "Trattoria Test",
        restaurant_url: "https://trattoria.test",
        menu_name: null,
        section: null,
        name: "Oysters",
        description: null,
        price: "",
        location: null
      }
    ]);
  });

  it("builds the response with failures", () => {
    const result: PipelineResult = {
      restaurant: { name: "Trattoria Test", canonicalUrl: "https://trattoria.test" },
      items: [oysters],
      failures: [{ url: "https://trattoria.test/menu.pdf", kind: "unreadable", message: "Source could not be read" }],
      reason: null
    };

    const response = exporter.toResponse(result);

    expect(response.items).toEqual([exporter.toRecord(oysters)]);
    expect(response.failures).toEqual([
      {
        url: "https://trattoria.test/menu.pdf",
        content_type: null,
        strategy: null,
        kind: "unreadable",
        message: "Source could not be read"
      }
    ]);
    expect(exporter.toResponse(result, "flat").items).toEqual(exporter.toFlatRecords([oysters]));
  });
});
