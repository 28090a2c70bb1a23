import { Request, Response, NextFunction } from "express";
import { logger } from "../utils/logger";
import { BaseAppError } from "../errors";
import { LOG_MESSAGES, LOG_SOURCES } from "../constants/log";

const STATUS_BY_GROUP: ReadonlyArray<[group: string, status: number]> = [
  ["validation/", 400],
  ["auth/", 401],
  ["fetch/", 502]
];

interface CodedError {
  code: string;
  message: string;
  details: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Pulls our error code out of an unknown error. Falls back to a duck-typed
 * check on `code` for errors that crossed a module boundary.
 */
function toCodedError(err: unknown): CodedError | null {
  if (err instanceof BaseAppError) {
    return { code: err.code, message: err.message, details: err.meta ?? {} };
  }

  if (isRecord(err) && typeof err.code === "string" && err.code.startsWith(BaseAppError.ERROR_PREFIX)) {
    const meta = isRecord(err.meta) ? err.meta : {};
    return {
      code: err.code,
      message: typeof err.message === "string" ? err.message : "",
      details: meta
    };
  }

  return null;
}

/**
 * Maps error codes to HTTP status codes by their group prefix
 */
export function getStatusCodeByCode(errorCode: string): number {
  const match = STATUS_BY_GROUP.find(([group]) => errorCode.startsWith(`${BaseAppError.ERROR_PREFIX}${group}`));
  return match ? match[1] : 500;
}

/**
 * Global Express error handler middleware.
 * Returns { error: { code, message, details } } for every failure.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const coded = toCodedError(err);

  if (coded) {
    res.status(getStatusCodeByCode(coded.code)).json({ error: coded });
    return;
  }

  logger.error(LOG_SOURCES.SERVER, err instanceof Error ? err.message : LOG_MESSAGES.UNKNOWN_ERROR, {
    path: req.path,
    method: req.method
  });

  if (err instanceof Error) {
    res.status(500).json({
      error: {
        code: "INTERNAL_ERROR",
        message: err.message,
        details: {}
      }
    });
    return;
  }

  res.status(500).json({
    error: {
      code: "UNKNOWN_ERROR",
      message: "An unknown error occurred",
      details: {}
    }
  });
}
