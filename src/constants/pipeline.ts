export const PIPELINE_DEFAULTS = {
  MIN_CHARS_PER_PAGE: 50,
  MAX_UNDECODABLE_RATIO: 0.1,
  VISION_MIN_DELAY_MS: 1000,
  VISION_TIMEOUT_MS: 60000,
  FETCH_TIMEOUT_MS: 30000,
  RESTAURANT_CONCURRENCY: 2,
  CURRENCY: "USD",
  CACHE_DB_PATH: "./vision-cache.db",
  CACHE_TTL_DAYS: 30
} as const;

export const PARSER_LIMITS = {
  // Lines inspected past a candidate name when looking for its price line
  PRICE_LOOKAHEAD: 2,
  MAX_NAME_WORDS: 8,
  MAX_NAME_LENGTH: 60,
  MAX_HEADER_WORDS: 6,
  MAX_LABEL_WORDS: 3,
  HEADER_FONT_RATIO: 1.2
} as const;

export const PRICE_LIMITS = {
  // Bare integers are only read as prices inside this range
  MIN_BARE_AMOUNT: 1,
  MAX_BARE_AMOUNT: 500
} as const;

export const DEFAULT_BOILERPLATE = [
  "all major credit cards",
  "prices subject to change",
  "consuming raw or undercooked",
  "please inform your server",
  "please alert your server",
  "gratuity",
  "all rights reserved",
  "follow us",
  "order online",
  "view menu",
  "download menu",
  "powered by"
] as const;

export const ADDON_SECTION_PATTERN = /\b(add[\s-]?ons?|extras|toppings|modifiers|enhancements)\b/i;
