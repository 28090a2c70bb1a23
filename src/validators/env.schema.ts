import { z } from "zod";
import { PIPELINE_DEFAULTS } from "../constants/pipeline";
import { VISION_CONFIG } from "../constants/vision";
import { SERVER_CONFIG } from "../constants/log";

const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform((val) => val || undefined);

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const EnvSchema = z.object({
  PORT: positiveInt(SERVER_CONFIG.DEFAULT_PORT),
  // Checked here at startup; auth and the logger read them from the environment per call
  API_KEY: optionalSecret,
  OPENAI_API_KEY: optionalSecret,
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  VISION_MODEL: z.string().trim().min(1).default(VISION_CONFIG.DEFAULT_MODEL),
  VISION_MIN_DELAY_MS: z.coerce.number().int().min(0).default(PIPELINE_DEFAULTS.VISION_MIN_DELAY_MS),
  VISION_TIMEOUT_MS: positiveInt(PIPELINE_DEFAULTS.VISION_TIMEOUT_MS),
  FETCH_TIMEOUT_MS: positiveInt(PIPELINE_DEFAULTS.FETCH_TIMEOUT_MS),
  PDF_MIN_CHARS_PER_PAGE: positiveInt(PIPELINE_DEFAULTS.MIN_CHARS_PER_PAGE),
  CACHE_DB_PATH: z.string().trim().min(1).default(PIPELINE_DEFAULTS.CACHE_DB_PATH),
  CACHE_TTL_DAYS: positiveInt(PIPELINE_DEFAULTS.CACHE_TTL_DAYS)
});
