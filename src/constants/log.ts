export const LOG_SOURCES = {
  CLASSIFIER: "CLASSIFIER",
  HTML: "HTML",
  PDF: "PDF",
  VISION: "VISION",
  PARSER: "PARSER",
  NORMALIZER: "NORMALIZER",
  PIPELINE: "PIPELINE",
  FETCH: "FETCH",
  EXTRACT: "EXTRACT",
  CACHE: "CACHE",
  SERVER: "SERVER",
  AUTH: "AUTH"
} as const;

export const LOG_MESSAGES = {
  // Classifier messages
  RESOURCE_CLASSIFIED: "Resource classified",
  CONTENT_TYPE_SNIFFED: "Content type sniffed from bytes",
  PDF_PROBE_FAILED: "PDF density probe failed, treating as scanned",

  // Adapter messages
  CORPUS_BUILT: "Line corpus built",
  SELECTOR_HINTS_EMPTY: "Selector hints matched nothing, using generic heuristic",
  PDF_PARSE_FAILED: "PDF parse failed",
  PAGE_RENDERED: "PDF page prepared for vision",
  VISION_ITEMS_DROPPED: "Dropped malformed vision items",

  // Vision messages
  VISION_REQUEST_STARTED: "Vision request started",
  VISION_REQUEST_SUCCESSFUL: "Vision request successful",
  VISION_RATE_LIMITED: "Vision request throttled",
  VISION_WAITING: "Waiting for vision rate limit slot",
  VISION_SKIPPED: "Skipping queued vision call for an aborted run",
  VISION_TEXT_FALLBACK: "Vision returned free text",

  // Cache messages
  CACHE_HIT: "Cache hit",
  CACHE_MISS: "Cache miss",
  CACHE_INITIALIZED: "Cache initialized",
  CACHE_DATABASE_CLOSED: "Cache database closed",
  CACHE_CORRUPTED_ENTRY: "Corrupted cache entry detected, deleting",
  SAVED_TO_CACHE: "Saved to cache",
  PURGED_OLD_RECORDS: "Purged expired records",

  // Parser and normalizer messages
  ITEMS_PARSED: "Raw items parsed",
  PRICE_UNRESOLVED: "Price could not be resolved",
  ITEM_REJECTED: "Candidate item rejected",
  ITEMS_NORMALIZED: "Menu items normalized",
  DUPLICATES_MERGED: "Duplicate items merged",

  // Pipeline messages
  RUN_STARTED: "Pipeline run started",
  RUN_FINISHED: "Pipeline run finished",
  RUN_ABORTED: "Pipeline run aborted",
  RESOURCE_STARTED: "Processing resource",
  RESOURCE_FAILED: "Resource failed, skipping",

  // Fetch messages
  FETCH_STARTED: "Fetch started",
  FETCH_SUCCESSFUL: "Fetch successful",
  FETCH_FAILED: "Fetch failed",
  EMPTY_RESPONSE_BODY: "Empty response body",

  // Extract endpoint messages
  REQUEST_SUCCESSFUL: "Request successful",

  // Server messages
  SERVER_LISTENING: "Server listening",
  GRACEFUL_SHUTDOWN: "Graceful shutdown initiated",
  FAILED_TO_START_SERVER: "Failed to start server",

  // Auth messages
  API_KEY_MISSING: "API key missing",
  API_KEY_INVALID: "Invalid API key",
  API_KEY_VALID: "API key valid",
  API_KEY_NOT_CONFIGURED: "API_KEY not configured in environment",

  UNKNOWN_ERROR: "Unknown error"
} as const;

export const SERVER_CONFIG = {
  DEFAULT_PORT: 3000,
  // Base64 PDFs and images travel in the request body
  JSON_BODY_LIMIT: "25mb",
  REQUEST_TIMEOUT_MS: 300000
} as const;
