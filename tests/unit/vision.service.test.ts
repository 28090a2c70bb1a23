import { OpenAIVisionService } from "../../src/services/vision.service";
import { VisionErrors } from "../../src/errors";

const mockCreate = jest.fn();

jest.mock("openai", () => {
  return jest.fn().mockImplementation(() => ({
    chat: {
      completions: {
        create: mockCreate
      }
    }
  }));
});

function completion(content: string | null) {
  return { choices: [{ message: { content } }] };
}

function throttled(): Error {
  return Object.assign(new Error("Rate limit reached"), { status: 429 });
}

describe("OpenAIVisionService", () => {
  const originalEnv = process.env.OPENAI_API_KEY;
  const image = { data: Buffer.from("img"), mimeType: "image/png" };

  beforeEach(() => {
    process.env.OPENAI_API_KEY = "test-key";
    jest.clearAllMocks();
  });

  afterEach(() => {
    if (originalEnv) {
      process.env.OPENAI_API_KEY = originalEnv;
    } else {
      delete process.env.OPENAI_API_KEY;
    }
  });

  it("returns structured items from a JSON reply", async () => {
    mockCreate.mockResolvedValue(completion(JSON.stringify({ items: [{ name: "Tacos", price: "$3" }, "junk"] })));
    const vision = new OpenAIVisionService();

    await expect(vision.extract(image)).resolves.toEqual({
      kind: "structured",
      items: [{ name: "Tacos", price: "$3" }]
    });
    expect(mockCreate).toHaveBeenCalledWith(
      expect.objectContaining({
        model: "gpt-4o-mini",
        response_format: { type: "json_object" }
      })
    );
  });

  it("passes the call's signal and timeout to the request", async () => {
    mockCreate.mockResolvedValue(completion(JSON.stringify({ items: [] })));
    const controller = new AbortController();

    await new OpenAIVisionService().extract(image, { timeoutMs: 5000, signal: controller.signal });

    expect(mockCreate).toHaveBeenCalledWith(expect.objectContaining({ model: "gpt-4o-mini" }), {
      signal: controller.signal,
      timeout: 5000
    });
  });

  it("attaches images as data URLs", async () => {
    mockCreate.mockResolvedValue(completion(JSON.stringify({ items: [] })));
    const vision = new OpenAIVisionService({ model: "gpt-4o" });

    await vision.extract(image);

    const [request] = mockCreate.mock.calls[0];
    expect(request.model).toBe("gpt-4o");
    expect(request.messages[1].content[1]).toEqual({
      type: "image_url",
      image_url: { url: "data:image/png;base64,aW1n", detail: "high" }
    });
  });

  it("attaches PDFs as files and names the page to read", async () => {
    mockCreate.mockResolvedValue(completion(JSON.stringify({ items: [] })));
    const vision = new OpenAIVisionService();

    await vision.extract({ data: Buffer.from("%PDF"), mimeType: "application/pdf", pageNumber: 2 });

    const [request] = mockCreate.mock.calls[0];
    expect(request.messages[1].content[0].text).toContain("page 2");
    expect(request.messages[1].content[1]).toEqual({
      type: "file",
      file: { filename: "menu.pdf", file_data: "data:application/pdf;base64,JVBERg==" }
    });
  });

  it("falls back to text when the reply is not an items object", async () => {
    mockCreate.mockResolvedValueOnce(completion("Tacos $3\nNachos $9"));
    mockCreate.mockResolvedValueOnce(completion(JSON.stringify({ menu: [] })));
    const vision = new OpenAIVisionService();

    await expect(vision.extract(image)).resolves.toEqual({ kind: "text", text: "Tacos $3\nNachos $9" });
    await expect(vision.extract(image)).resolves.toEqual({ kind: "text", text: "{\"menu\":[]}" });
  });

  it("throws if OPENAI_API_KEY missing", async () => {
    delete process.env.OPENAI_API_KEY;
    const vision = new OpenAIVisionService();

    await expect(vision.extract(image)).rejects.toBeInstanceOf(VisionErrors.ApiKeyMissingError);
    expect(mockCreate).not.toHaveBeenCalled();
  });

  it("rejects an empty reply without retrying", async () => {
    mockCreate.mockResolvedValue(completion(null));
    const vision = new OpenAIVisionService({ retries: 2, retryDelayMs: 1 });

    await expect(vision.extract(image)).rejects.toBeInstanceOf(VisionErrors.InvalidResponseError);
    expect(mockCreate).toHaveBeenCalledTimes(1);
  });

  it("retries while throttled", async () => {
    mockCreate.mockRejectedValueOnce(throttled());
    mockCreate.mockResolvedValueOnce(completion(JSON.stringify({ items: [{ name: "Tacos" }] })));
    const vision = new OpenAIVisionService({ retries: 2, retryDelayMs: 1 });

    await expect(vision.extract(image)).resolves.toEqual({ kind: "structured", items: [{ name: "Tacos" }] });
    expect(mockCreate).toHaveBeenCalledTimes(2);
  });

  it("gives up with a rate-limit error once retries run out", async () => {
    mockCreate.mockRejectedValue(throttled());
    const vision = new OpenAIVisionService({ retries: 1, retryDelayMs: 1 });

    await expect(vision.extract(image)).rejects.toBeInstanceOf(VisionErrors.RateLimitedError);
    expect(mockCreate).toHaveBeenCalledTimes(2);
  });

  it("does not retry client errors", async () => {
    mockCreate.mockRejectedValue(Object.assign(new Error("Invalid image"), { status: 400 }));
    const vision = new OpenAIVisionService({ retries: 2, retryDelayMs: 1 });

    await expect(vision.extract(image)).rejects.toThrow("Invalid image");
    expect(mockCreate).toHaveBeenCalledTimes(1);
  });
});
