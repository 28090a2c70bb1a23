import { BaseAppError } from "./BaseAppError";

const VISION_ERROR_PREFIX = `${BaseAppError.ERROR_PREFIX}vision/`;

export const VisionErrors = {
  ApiKeyMissingError: class extends BaseAppError {
    constructor(meta?: Record<string, unknown>) {
      super(meta);
      this.code = `${VISION_ERROR_PREFIX}apiKeyMissing`;
      this.message = "Missing OPENAI_API_KEY. Set it in .env";
    }
  },

  RateLimitedError: class extends BaseAppError {
    constructor(meta?: Record<string, unknown>) {
      super(meta);
      this.code = `${VISION_ERROR_PREFIX}rateLimited`;
      this.message = "Vision service is throttling requests";
    }
  },

  InvalidResponseError: class extends BaseAppError {
    constructor(meta?: Record<string, unknown>) {
      super(meta);
      this.code = `${VISION_ERROR_PREFIX}invalidResponse`;
      this.message = "Vision service returned an empty response";
    }
  },
};
