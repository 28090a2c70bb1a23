import "dotenv/config";
import express from "express";
import extractRouter from "./routes/extract.route";
import { visionCacheService } from "./services/cache.service";
import { logger } from "./utils/logger";
import { loadAppConfig } from "./utils/config";
import { LOG_SOURCES, LOG_MESSAGES, SERVER_CONFIG } from "./constants/log";
import { errorHandler } from "./middleware/error.middleware";

const app = express();

// Request body size limit
app.use(express.json({ limit: SERVER_CONFIG.JSON_BODY_LIMIT }));

// Request timeout
app.use((req, res, next) => {
  req.setTimeout(SERVER_CONFIG.REQUEST_TIMEOUT_MS, () => {
    res.status(408).json({
      error: {
        code: "REQUEST_TIMEOUT",
        message: "Request timeout",
        details: {}
      }
    });
  });
  next();
});

app.use("/api", extractRouter);

// Global error handler (must be last middleware)
app.use(errorHandler);

/**
 * Initialize services and start the server
 */
async function startServer(): Promise<void> {
  try {
    const config = loadAppConfig();

    // Expired vision responses are purged on init
    await visionCacheService.init(config.cacheDbPath, config.cacheTtlDays);

    const server = app.listen(config.port, () => {
      logger.system(LOG_MESSAGES.SERVER_LISTENING, { port: config.port });
    });

    const shutdown = (signal: string): void => {
      logger.system(LOG_MESSAGES.GRACEFUL_SHUTDOWN, { signal });
      server.close();
      visionCacheService
        .close()
        .then(() => process.exit(0))
        .catch(error => {
          logger.error(LOG_SOURCES.SERVER, error instanceof Error ? error : LOG_MESSAGES.UNKNOWN_ERROR);
          process.exit(1);
        });
    };

    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
  } catch (error) {
    logger.error(LOG_SOURCES.SERVER, LOG_MESSAGES.FAILED_TO_START_SERVER, {
      reason: error instanceof Error ? error.message : "unknown"
    });
    process.exit(1);
  }
}

if (require.main === module) {
  void startServer();
}

export default app;
