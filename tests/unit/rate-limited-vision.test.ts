import { RateLimitedVisionCapability } from "../../src/services/rate-limited-vision";
import { PipelineErrors } from "../../src/errors";
import { TimeoutExceededError } from "../../src/utils/timeout";
import { VisionCapability, VisionResponse } from "../../src/types/vision.types";

describe("RateLimitedVisionCapability", () => {
  const request = { data: Buffer.from("img"), mimeType: "image/png" };
  let clock: number;
  let sleep: jest.Mock;

  beforeEach(() => {
    clock = 0;
    sleep = jest.fn(async (ms: number) => {
      clock += ms;
    });
  });

  it("runs calls one at a time with the minimum gap between them", async () => {
    let active = 0;
    let maxActive = 0;
    const inner: VisionCapability = {
      extract: jest.fn(async (): Promise<VisionResponse> => {
        active++;
        maxActive = Math.max(maxActive, active);
        await Promise.resolve();
        clock += 100;
        active--;
        return { kind: "text", text: "Soup 6" };
      })
    };
    const limited = new RateLimitedVisionCapability(inner, { minDelayMs: 1000, sleep, now: () => clock });

    await Promise.all([limited.extract(request), limited.extract(request), limited.extract(request)]);

    expect(inner.extract).toHaveBeenCalledTimes(3);
    expect(maxActive).toBe(1);
    expect(sleep.mock.calls).toEqual([[1000], [1000]]);
  });

  it("does not wait when the gap has already passed", async () => {
    const inner: VisionCapability = { extract: jest.fn().mockResolvedValue({ kind: "text", text: "" }) };
    const limited = new RateLimitedVisionCapability(inner, { minDelayMs: 1000, sleep, now: () => clock });

    await limited.extract(request);
    clock += 5000;
    await limited.extract(request);

    expect(sleep).not.toHaveBeenCalled();
  });

  it("keeps the queue moving after a failed call", async () => {
    const inner: VisionCapability = {
      extract: jest
        .fn()
        .mockRejectedValueOnce(new Error("model overloaded"))
        .mockResolvedValueOnce({ kind: "text", text: "Soup 6" })
    };
    const limited = new RateLimitedVisionCapability(inner, { minDelayMs: 250, sleep, now: () => clock });

    const first = limited.extract(request);
    const second = limited.extract(request);

    await expect(first).rejects.toThrow("model overloaded");
    await expect(second).resolves.toEqual({ kind: "text", text: "Soup 6" });
    expect(sleep).toHaveBeenCalledWith(250);
  });

  describe("timeouts and aborts", () => {
    const response: VisionResponse = { kind: "text", text: "Soup 6" };

    beforeEach(() => {
      jest.useFakeTimers();
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    function slowInner(ms: number): VisionCapability & { extract: jest.Mock } {
      return {
        extract: jest.fn(() => new Promise<VisionResponse>(resolve => setTimeout(() => resolve(response), ms)))
      };
    }

    it("starts a call's timeout when it leaves the queue", async () => {
      const inner = slowInner(150);
      const limited = new RateLimitedVisionCapability(inner, { minDelayMs: 0 });

      const first = limited.extract(request, { timeoutMs: 200 });
      const second = limited.extract(request, { timeoutMs: 200 });
      await jest.advanceTimersByTimeAsync(300);

      await expect(first).resolves.toEqual(response);
      await expect(second).resolves.toEqual(response);
      expect(inner.extract).toHaveBeenCalledTimes(2);
    });

    it("times out a call that runs longer than its timeout", async () => {
      const limited = new RateLimitedVisionCapability(slowInner(500), { minDelayMs: 0 });

      const call = limited.extract(request, { timeoutMs: 200 });
      const settled = expect(call).rejects.toBeInstanceOf(TimeoutExceededError);
      await jest.advanceTimersByTimeAsync(200);

      await settled;
    });

    it("skips a queued call whose run was aborted", async () => {
      const inner = slowInner(150);
      const limited = new RateLimitedVisionCapability(inner, { minDelayMs: 0 });
      const controller = new AbortController();

      const first = limited.extract(request);
      const second = limited.extract(request, { signal: controller.signal });
      const skipped = expect(second).rejects.toBeInstanceOf(PipelineErrors.RunAbortedError);
      controller.abort();
      await jest.advanceTimersByTimeAsync(150);

      await expect(first).resolves.toEqual(response);
      await skipped;
      expect(inner.extract).toHaveBeenCalledTimes(1);
    });
  });
});
