export class PersonalServerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly status: number = 500,
  ) {
    super(message);
    this.name = "PersonalServerError";
  }
}

export class MalformedBodyError extends PersonalServerError {
  constructor(cause: string) {
    super(`Invalid JSON: ${cause}`, "MALFORMED_BODY", 400);
    this.name = "MalformedBodyError";
  }
}

export class InvalidParameterError extends PersonalServerError {
  constructor(message: string) {
    super(message, "INVALID_PARAMETER", 400);
    this.name = "InvalidParameterError";
  }
}

export class RouteNotFoundError extends PersonalServerError {
  constructor() {
    super("Not found", "ROUTE_NOT_FOUND", 404);
    this.name = "RouteNotFoundError";
  }
}

export class PayloadTooLargeError extends PersonalServerError {
  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`, "PAYLOAD_TOO_LARGE", 413);
    this.name = "PayloadTooLargeError";
  }
}

export class StorageWriteError extends PersonalServerError {
  constructor(filePath: string, cause: string) {
    super(`Failed to write '${filePath}': ${cause}`, "STORAGE_WRITE_FAILED", 500);
    this.name = "StorageWriteError";
  }
}

export class ScrapeError extends PersonalServerError {
  constructor(cause: string) {
    super(`Scrape failed: ${cause}`, "SCRAPE_FAILED", 502);
    this.name = "ScrapeError";
  }
}

export class ConfigError extends PersonalServerError {
  constructor(message: string) {
    super(message, "INVALID_CONFIG");
    this.name = "ConfigError";
  }
}

/** Human-readable cause for an unknown thrown value, with errno codes spelled out. */
export function describeCause(err: unknown): string {
  if (err instanceof Error) {
    const code = "code" in err ? err.code : undefined;
    if (code === "EACCES" || code === "EPERM") return "Permission denied";
    if (code === "ENOSPC") return "No space left on device";
    if (code === "EROFS") return "Read-only file system";
    if (code === "ENOTDIR") return "Path component is not a directory";
    return err.message;
  }
  return String(err);
}
