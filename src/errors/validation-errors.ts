import { BaseAppError } from "./BaseAppError";

const VALIDATION_ERROR_PREFIX = `${BaseAppError.ERROR_PREFIX}validation/`;

export const ValidationErrors = {
  InvalidRequestError: class extends BaseAppError {
    constructor(meta?: Record<string, unknown>) {
      super(meta);
      this.code = `${VALIDATION_ERROR_PREFIX}invalidRequest`;
      this.message = "Request body does not match the extraction schema";
    }
  },

  InvalidUrlFormatError: class extends BaseAppError {
    constructor(meta?: Record<string, unknown>) {
      super(meta);
      this.code = `${VALIDATION_ERROR_PREFIX}invalidUrlFormat`;
      this.message = "url must be a valid HTTP/HTTPS URL";
    }
  },

  NoResourcesError: class extends BaseAppError {
    constructor(meta?: Record<string, unknown>) {
      super(meta);
      this.code = `${VALIDATION_ERROR_PREFIX}noResources`;
      this.message = "resources must contain at least one entry";
    }
  },

  InvalidConfigError: class extends BaseAppError {
    constructor(meta?: Record<string, unknown>) {
      super(meta);
      this.code = `${VALIDATION_ERROR_PREFIX}invalidConfig`;
      this.message = "Configuration is invalid";
    }
  },
};
