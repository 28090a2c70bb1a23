import { BaseAppError } from "./BaseAppError";

const FETCH_ERROR_PREFIX = `${BaseAppError.ERROR_PREFIX}fetch/`;

export const FetchErrors = {
  FetchFailedError: class extends BaseAppError {
    constructor(meta?: Record<string, unknown>) {
      super(meta);
      this.code = `${FETCH_ERROR_PREFIX}fetchFailed`;
      this.message = "Failed to fetch URL";
    }
  },

  EmptyBodyError: class extends BaseAppError {
    constructor(meta?: Record<string, unknown>) {
      super(meta);
      this.code = `${FETCH_ERROR_PREFIX}emptyBody`;
      this.message = "Empty response body";
    }
  },
};
