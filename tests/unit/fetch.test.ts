import axios from "axios";
import { FetchService } from "../../src/services/fetch.service";
import { FetchErrors } from "../../src/errors";

jest.mock("axios");
const mockedAxios = axios as jest.Mocked<typeof axios>;

describe("FetchService", () => {
  const fetcher = new FetchService(5000);

  afterEach(() => {
    jest.clearAllMocks();
  });

  it("returns the body, content type and resource metadata", async () => {
    const html = Buffer.from("<html><body><p>Soup 6</p></body></html>");
    mockedAxios.get.mockResolvedValue({ data: html, headers: { "content-type": "text/html; charset=utf-8" } });

    const resource = await fetcher.fetchResource({ url: "https://example.test/menu", hint: "lunch", location: "Downtown" });

    expect(resource).toEqual({
      bytes: html,
      contentType: "text/html; charset=utf-8",
      url: "https://example.test/menu",
      hint: "lunch",
      location: "Downtown"
    });
    expect(mockedAxios.get).toHaveBeenCalledWith(
      "https://example.test/menu",
      expect.objectContaining({
        responseType: "arraybuffer",
        headers: expect.objectContaining({
          "User-Agent": expect.any(String)
        }),
        timeout: 5000
      })
    );
  });

  it("leaves the content type empty when the server sends none", async () => {
    mockedAxios.get.mockResolvedValue({ data: Buffer.from("%PDF-1.7"), headers: {} });

    const resource = await fetcher.fetchResource({ url: "https://example.test/menu.pdf" });

    expect(resource.contentType).toBe("");
  });

  it("throws if the body is empty", async () => {
    mockedAxios.get.mockResolvedValue({ data: Buffer.alloc(0), headers: {} });

    await expect(fetcher.fetchResource({ url: "https://example.test/menu" })).rejects.toBeInstanceOf(
      FetchErrors.EmptyBodyError
    );
  });

  it("wraps network failures with their reason", async () => {
    mockedAxios.get.mockRejectedValue(new Error("Network error"));

    await expect(fetcher.fetchResource({ url: "https://example.test/menu" })).rejects.toMatchObject({
      code: "menuExtractor/fetch/fetchFailed",
      message: "Failed to fetch URL",
      meta: { url: "https://example.test/menu", reason: "Network error" }
    });
  });

  it("keeps the HTTP status of a failed response", async () => {
    const failure = Object.assign(new Error("Request failed with status code 404"), { response: { status: 404 } });
    mockedAxios.get.mockRejectedValue(failure);
    mockedAxios.isAxiosError.mockReturnValue(true);

    await expect(fetcher.fetchResource({ url: "https://example.test/gone" })).rejects.toMatchObject({
      meta: { reason: "Request failed with status code 404", status: 404 }
    });
  });
});
