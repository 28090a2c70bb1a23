import axios from "axios";
import { ExtractService } from "../../src/services/extract.service";
import { loadAppConfig } from "../../src/utils/config";

jest.mock("axios");
const mockedAxios = axios as jest.Mocked<typeof axios>;

describe("ExtractService", () => {
  afterEach(() => {
    jest.clearAllMocks();
  });

  it("fetches remote resources with the configured timeout", async () => {
    mockedAxios.get.mockResolvedValue({
      data: Buffer.from("<html><body><p>Soup 6</p></body></html>"),
      headers: { "content-type": "text/html" }
    });
    const service = new ExtractService({ config: loadAppConfig({ FETCH_TIMEOUT_MS: "1234" }) });

    await service.extract({
      restaurant: { name: "Soup Shack", url: "https://soup.test" },
      resources: [{ url: "https://soup.test/menu" }]
    });

    expect(mockedAxios.get).toHaveBeenCalledWith(
      "https://soup.test/menu",
      expect.objectContaining({ timeout: 1234, responseType: "arraybuffer" })
    );
  });
});
