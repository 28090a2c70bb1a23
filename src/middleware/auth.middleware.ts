import { timingSafeEqual } from "node:crypto";
import { Request, Response, NextFunction } from "express";
import { AuthErrors } from "../errors";
import { logger } from "../utils/logger";
import { LOG_SOURCES, LOG_MESSAGES } from "../constants/log";

/**
 * Reads the caller's key from x-api-key, falling back to Authorization: Bearer <key>
 */
function readApiKey(req: Request): string | undefined {
  const header = req.headers["x-api-key"];
  const apiKey = Array.isArray(header) ? header[0] : header;
  if (apiKey) {
    return apiKey;
  }

  const authHeader = req.headers.authorization;
  if (authHeader && authHeader.startsWith("Bearer ")) {
    return authHeader.substring(7).trim() || undefined;
  }
  return undefined;
}

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Middleware to require API key authentication.
 * Failures go to the global error handler, which answers 401.
 */
export function requireApiKey(req: Request, res: Response, next: NextFunction): void {
  const apiKey = readApiKey(req);

  if (!apiKey) {
    logger.warn(LOG_SOURCES.AUTH, LOG_MESSAGES.API_KEY_MISSING, { ip: req.ip, path: req.path });
    next(new AuthErrors.ApiKeyMissingError());
    return;
  }

  const validApiKey = process.env.API_KEY;

  if (!validApiKey) {
    logger.error(LOG_SOURCES.AUTH, LOG_MESSAGES.API_KEY_NOT_CONFIGURED);
    res.status(500).json({
      error: {
        code: "INTERNAL_ERROR",
        message: "API key not configured on server",
        details: {}
      }
    });
    return;
  }

  if (!keysMatch(apiKey, validApiKey)) {
    logger.warn(LOG_SOURCES.AUTH, LOG_MESSAGES.API_KEY_INVALID, { ip: req.ip, path: req.path });
    next(new AuthErrors.UnauthorizedError());
    return;
  }

  logger.debug(LOG_SOURCES.AUTH, LOG_MESSAGES.API_KEY_VALID, { path: req.path });
  next();
}
