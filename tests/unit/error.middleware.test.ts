import { Request, Response, NextFunction } from "express";
import { errorHandler, getStatusCodeByCode } from "../../src/middleware/error.middleware";
import { ExtractionErrors, FetchErrors, ValidationErrors } from "../../src/errors";

describe("Error Middleware", () => {
  let res: Partial<Response>;
  let jsonMock: jest.Mock;
  let statusMock: jest.Mock;
  const req: Partial<Request> = { path: "/api/extract", method: "POST" };
  const next: NextFunction = jest.fn();

  beforeEach(() => {
    jsonMock = jest.fn();
    statusMock = jest.fn(() => ({ json: jsonMock }));
    res = { status: statusMock, json: jsonMock };
  });

  it("maps error groups to status codes", () => {
    expect(getStatusCodeByCode("menuExtractor/validation/noResources")).toBe(400);
    expect(getStatusCodeByCode("menuExtractor/auth/unauthorized")).toBe(401);
    expect(getStatusCodeByCode("menuExtractor/fetch/fetchFailed")).toBe(502);
    expect(getStatusCodeByCode("menuExtractor/cache/readFailed")).toBe(500);
  });

  it("answers with the error code, message and details", () => {
    errorHandler(new ValidationErrors.NoResourcesError({ field: "resources" }), req as Request, res as Response, next);

    expect(statusMock).toHaveBeenCalledWith(400);
    expect(jsonMock).toHaveBeenCalledWith({
      error: {
        code: "menuExtractor/validation/noResources",
        message: "resources must contain at least one entry",
        details: { field: "resources" }
      }
    });
  });

  it("uses empty details when the error has no meta", () => {
    errorHandler(new FetchErrors.FetchFailedError(), req as Request, res as Response, next);

    expect(statusMock).toHaveBeenCalledWith(502);
    expect(jsonMock.mock.calls[0][0].error.details).toEqual({});
  });

  it("answers 500 for extraction failures", () => {
    errorHandler(new ExtractionErrors.TimeoutError({ timeoutMs: 10 }), req as Request, res as Response, next);

    expect(statusMock).toHaveBeenCalledWith(500);
  });

  it("hides unknown errors behind a generic code", () => {
    errorHandler(new Error("boom"), req as Request, res as Response, next);
    errorHandler("boom", req as Request, res as Response, next);

    expect(jsonMock.mock.calls[0][0].error.code).toBe("INTERNAL_ERROR");
    expect(jsonMock.mock.calls[1][0]).toEqual({
      error: { code: "UNKNOWN_ERROR", message: "An unknown error occurred", details: {} }
    });
  });
});
