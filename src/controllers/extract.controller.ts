import { Request, Response, NextFunction } from "express";
import { extractService } from "../services/extract.service";

/**
 * Runs one extraction per request. A client that disconnects aborts the run.
 */
export function handleExtract(req: Request, res: Response, next: NextFunction): void {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });

  extractService
    .extract(req.body, controller.signal)
    .then(result => {
      res.status(200).json(result);
    })
    .catch(error => {
      next(error);
    });
}
