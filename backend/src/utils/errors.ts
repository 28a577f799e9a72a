/**
 * Error taxonomy for the query engine.
 *
 * Every error the engine raises on purpose extends {@link EngineError} and carries a
 * stable `code`; the HTTP layer maps codes to status codes and everything else
 * is treated as an internal failure.
 */
import type { MappedEntity } from "../services/executors/sql.types";

export type EngineErrorCode =
  | "CONNECTION_ERROR"
  | "UNSUPPORTED_DESCRIPTOR"
  | "INTROSPECTION_ERROR"
  | "QUERY_NOT_UNDERSTOOD"
  | "TIMEOUT"
  | "QUERY_SYNTAX_ERROR"
  | "INDEX_UNAVAILABLE"
  | "CACHE_CORRUPTION"
  | "NOT_CONNECTED"
  | "REQUEST_CANCELLED";

export class EngineError extends Error {
  public readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = "EngineError";
    Object.setPrototypeOf(this, EngineError.prototype);
  }
}

/** Storage unreachable, credentials rejected, or the connection dropped. */
export class ConnectionError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONNECTION_ERROR", message, options);
    this.name = "ConnectionError";
    Object.setPrototypeOf(this, ConnectionError.prototype);
  }
}

export class UnsupportedDescriptorError extends EngineError {
  constructor(scheme: string) {
    super(
      "UNSUPPORTED_DESCRIPTOR",
      `Unsupported connection descriptor "${scheme}". Use postgres://, mysql://, sqlite:<file> or a .db/.sqlite path.`
    );
    this.name = "UnsupportedDescriptorError";
    Object.setPrototypeOf(this, UnsupportedDescriptorError.prototype);
  }
}

export class IntrospectionError extends EngineError {
  public readonly table?: string;

  constructor(message: string, options?: { cause?: unknown; table?: string }) {
    super("INTROSPECTION_ERROR", message, options);
    this.table = options?.table;
    this.name = "IntrospectionError";
    Object.setPrototypeOf(this, IntrospectionError.prototype);
  }
}

/**
 * Nothing in the question mapped to the schema and no free text was left over for
 * document search. Carries what did match so callers can show it back.
 */
export class QueryNotUnderstood extends EngineError {
  public readonly matched: readonly MappedEntity[];
  public readonly unmatched: readonly string[];

  constructor(message: string, details: { matched: readonly MappedEntity[]; unmatched: readonly string[] }) {
    super("QUERY_NOT_UNDERSTOOD", message);
    this.matched = details.matched;
    this.unmatched = details.unmatched;
    this.name = "QueryNotUnderstood";
    Object.setPrototypeOf(this, QueryNotUnderstood.prototype);
  }
}

export class TimeoutError extends EngineError {
  public readonly label: string;
  public readonly timeoutMs?: number;

  constructor(label: string, timeoutMs?: number) {
    super("TIMEOUT", timeoutMs === undefined ? `${label} was cancelled by the store` : `${label} timed out after ${timeoutMs}ms`);
    this.label = label;
    this.timeoutMs = timeoutMs;
    this.name = "TimeoutError";
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/** The store rejected a generated statement. */
export class QuerySyntaxError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("QUERY_SYNTAX_ERROR", message, options);
    this.name = "QuerySyntaxError";
    Object.setPrototypeOf(this, QuerySyntaxError.prototype);
  }
}

export class IndexUnavailable extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INDEX_UNAVAILABLE", message, options);
    this.name = "IndexUnavailable";
    Object.setPrototypeOf(this, IndexUnavailable.prototype);
  }
}

export class CacheCorruption extends EngineError {
  constructor(message: string) {
    super("CACHE_CORRUPTION", message);
    this.name = "CacheCorruption";
    Object.setPrototypeOf(this, CacheCorruption.prototype);
  }
}

export class NotConnectedError extends EngineError {
  constructor() {
    super("NOT_CONNECTED", "No database is connected. Connect one before asking questions.");
    this.name = "NotConnectedError";
    Object.setPrototypeOf(this, NotConnectedError.prototype);
  }
}

/** The caller went away before an answer was ready. */
export class RequestCancelled extends EngineError {
  constructor() {
    super("REQUEST_CANCELLED", "The request was cancelled by the client.");
    this.name = "RequestCancelled";
    Object.setPrototypeOf(this, RequestCancelled.prototype);
  }
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
