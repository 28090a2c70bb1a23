export { BaseAppError } from "./BaseAppError";
export { ValidationErrors } from "./validation-errors";
export { AuthErrors } from "./auth-errors";
export { FetchErrors } from "./fetch-errors";
export { VisionErrors } from "./vision-errors";
export { ExtractionErrors, ExtractionFailure } from "./extraction-errors";
export type { ExtractionFailureKind } from "./extraction-errors";
export { PipelineErrors } from "./pipeline-errors";
export { CacheErrors } from "./cache-errors";
