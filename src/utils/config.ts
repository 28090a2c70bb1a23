import { ValidationErrors } from "../errors";
import { AppConfig } from "../types/config.types";
import { EnvSchema } from "../validators/env.schema";

/**
 * Reads and validates the process environment.
 * Throws InvalidConfigError naming the first offending variable.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationErrors.InvalidConfigError({
      variable: issue?.path.join("."),
      reason: issue?.message
    });
  }

  const data = parsed.data;
  return {
    port: data.PORT,
    openaiApiKey: data.OPENAI_API_KEY,
    visionModel: data.VISION_MODEL,
    visionMinDelayMs: data.VISION_MIN_DELAY_MS,
    visionTimeoutMs: data.VISION_TIMEOUT_MS,
    fetchTimeoutMs: data.FETCH_TIMEOUT_MS,
    pdfMinCharsPerPage: data.PDF_MIN_CHARS_PER_PAGE,
    cacheDbPath: data.CACHE_DB_PATH,
    cacheTtlDays: data.CACHE_TTL_DAYS
  };
}
