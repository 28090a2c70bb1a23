import { Pdf2JsonReader } from "../../src/services/pdf-reader.service";

jest.mock("pdf2json", () => {
  const { EventEmitter } = require("events");

  return class FakePdfParser extends EventEmitter {
    parseBuffer(buffer: Buffer): void {
      const content = buffer.toString();
      if (content === "broken") {
        process.nextTick(() => this.emit("pdfParser_dataError", { parserError: new Error("Invalid PDF structure") }));
        return;
      }
      process.nextTick(() =>
        this.emit("pdfParser_dataReady", {
          Pages: [
            {
              Texts: [
                { x: 1, y: 2, R: [{ T: "Caf%C3%A9%20Latte", TS: [0, 14, 1, 0] }] },
                { x: 12, y: 2, R: [{ T: "100%", TS: [0, 11, 0, 0] }] }
              ]
            },
            { Texts: [] }
          ]
        })
      );
    }
  };
});

describe("Pdf2JsonReader", () => {
  const reader = new Pdf2JsonReader();

  it("decodes text runs with their position and style", async () => {
    await expect(reader.read(Buffer.from("%PDF-1.4"))).resolves.toEqual({
      pages: [
        [
          { text: "Café Latte", x: 1, y: 2, fontSize: 14, bold: true },
          { text: "100%", x: 12, y: 2, fontSize: 11, bold: false }
        ],
        []
      ]
    });
  });

  it("rejects with the parser error", async () => {
    await expect(reader.read(Buffer.from("broken"))).rejects.toThrow("Invalid PDF structure");
  });
});
