import { BaseAppError } from "./BaseAppError";

const EXTRACTION_ERROR_PREFIX = `${BaseAppError.ERROR_PREFIX}extraction/`;

export type ExtractionFailureKind = "unreadable" | "capability" | "timeout";

/**
 * A strategy adapter could not turn a resource into a line corpus.
 * An empty corpus is not a failure; only an unusable source is.
 */
export abstract class ExtractionFailure extends BaseAppError {
  abstract readonly kind: ExtractionFailureKind;
}

export const ExtractionErrors = {
  SourceUnreadableError: class extends ExtractionFailure {
    readonly kind = "unreadable";

    constructor(meta?: Record<string, unknown>) {
      super(meta);
      this.code = `${EXTRACTION_ERROR_PREFIX}sourceUnreadable`;
      this.message = "Source could not be read";
    }
  },

  CapabilityFailedError: class extends ExtractionFailure {
    readonly kind = "capability";

    constructor(meta?: Record<string, unknown>) {
      super(meta);
      this.code = `${EXTRACTION_ERROR_PREFIX}capabilityFailed`;
      this.message = "Vision capability failed to extract the source";
    }
  },

  TimeoutError: class extends ExtractionFailure {
    readonly kind = "timeout";

    constructor(meta?: Record<string, unknown>) {
      super(meta);
      this.code = `${EXTRACTION_ERROR_PREFIX}timeout`;
      this.message = "External call timed out";
    }
  },
};
