export const VISION_CONFIG = {
  DEFAULT_MODEL: "gpt-4o-mini",
  TEMPERATURE: 0.1,
  MAX_OUTPUT_TOKENS: 8000,
  RETRIES: 3,
  RETRY_DELAY_MS: 1000
} as const;

export const VISION_MIME_TYPES = {
  PNG: "image/png",
  JPEG: "image/jpeg",
  PDF: "application/pdf"
} as const;
