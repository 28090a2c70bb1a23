import { BaseAppError } from "./BaseAppError";

const PIPELINE_ERROR_PREFIX = `${BaseAppError.ERROR_PREFIX}pipeline/`;

export const PipelineErrors = {
  RunAbortedError: class extends BaseAppError {
    constructor(meta?: Record<string, unknown>) {
      super(meta);
      this.code = `${PIPELINE_ERROR_PREFIX}runAborted`;
      this.message = "Pipeline run was aborted before completion";
    }
  },
};
