export class BaseAppError extends Error {
  static ERROR_PREFIX = "menuExtractor/";
  
  public code: string = "";
  public message: string = "";
  public meta?: Record<string, unknown>;

  constructor(meta?: Record<string, unknown>) {
    super();
    this.meta = meta;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}
