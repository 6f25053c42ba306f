export type GatewayErrorCode =
  | "NOT_FOUND"
  | "OPEN_FAILURE"
  | "FORBIDDEN"
  | "TIMEOUT"
  | "UNKNOWN_TABLE"
  | "UNSUPPORTED_FORMAT"
  | "INVALID_IDENTIFIER"
  | "CONNECTION_CLOSED"
  | "ENGINE_FAILURE";

/**
 * Base class for every failure the gateway surfaces to callers.
 * Engine-native error types never cross this boundary; they ride along as `cause`.
 */
export class GatewayError extends Error {
  readonly code: GatewayErrorCode;

  constructor(code: GatewayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GatewayError";
    this.code = code;
  }
}

export class NotFoundError extends GatewayError {
  readonly path: string;

  constructor(what: "Database file" | "File", path: string) {
    super("NOT_FOUND", `${what} not found: ${path}`);
    this.name = "NotFoundError";
    this.path = path;
  }
}

export class OpenFailureError extends GatewayError {
  constructor(path: string, cause: unknown) {
    super("OPEN_FAILURE", `Error opening database at ${path}: ${errorMessage(cause)}`, { cause });
    this.name = "OpenFailureError";
  }
}

export class ForbiddenError extends GatewayError {
  readonly keywords: string[];

  constructor(keywords: string[]) {
    super("FORBIDDEN", `${keywords.join(", ")} blocked — DELETE, DROP and UPDATE operations are not allowed.`);
    this.name = "ForbiddenError";
    this.keywords = keywords;
  }
}

export class TimeoutError extends GatewayError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super("TIMEOUT", `Query exceeded timeout of ${timeoutMs} ms and was interrupted.`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class UnknownTableError extends GatewayError {
  readonly table: string;

  constructor(table: string, cause: unknown) {
    super("UNKNOWN_TABLE", `Table "${table}" not found: ${errorMessage(cause)}`, { cause });
    this.name = "UnknownTableError";
    this.table = table;
  }
}

export class UnsupportedFormatError extends GatewayError {
  constructor(format: string) {
    super("UNSUPPORTED_FORMAT", `Unsupported file format "${format}". Supported formats are CSV and JSON.`);
    this.name = "UnsupportedFormatError";
  }
}

export class InvalidIdentifierError extends GatewayError {
  constructor(identifier: string) {
    super(
      "INVALID_IDENTIFIER",
      `Invalid table name "${identifier}". Only letters, digits and underscores are allowed.`,
    );
    this.name = "InvalidIdentifierError";
  }
}

export class ConnectionClosedError extends GatewayError {
  constructor(path: string) {
    super("CONNECTION_CLOSED", `Database connection to ${path} is closed.`);
    this.name = "ConnectionClosedError";
  }
}

/**
 * Any other engine failure. The message is the engine's own, untouched;
 * `engineErrorType` is the leading "<Type> Error:" tag DuckDB puts on it, when present.
 */
export class EngineFailureError extends GatewayError {
  readonly engineErrorType: string | null;

  constructor(message: string, options?: { cause?: unknown }) {
    super("ENGINE_FAILURE", message, options);
    this.name = "EngineFailureError";
    this.engineErrorType = engineErrorType(message);
  }

  static from(err: unknown): GatewayError {
    if (err instanceof GatewayError) return err;
    return new EngineFailureError(errorMessage(err), { cause: err });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** "Catalog Error: Table with name x does not exist!" → "Catalog" */
export function engineErrorType(message: string): string | null {
  const match = message.match(/^([A-Za-z ]+?) Error:/);
  return match ? match[1] : null;
}

export function isCatalogError(err: unknown): boolean {
  return err instanceof EngineFailureError && err.engineErrorType === "Catalog";
}
