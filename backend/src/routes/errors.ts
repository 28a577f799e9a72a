// Maps engine errors onto HTTP responses
import type { FastifyBaseLogger, FastifyReply } from "fastify";
import type { ZodError } from "zod";
import type { ErrorBody } from "../../../shared/types";
import { isEngineError, QueryNotUnderstood, RequestCancelled, toError, type EngineErrorCode } from "../utils/errors";

const STATUS_BY_CODE: Record<EngineErrorCode, number> = {
  NOT_CONNECTED: 400,
  UNSUPPORTED_DESCRIPTOR: 400,
  QUERY_NOT_UNDERSTOOD: 422,
  CONNECTION_ERROR: 502,
  INTROSPECTION_ERROR: 502,
  QUERY_SYNTAX_ERROR: 502,
  INDEX_UNAVAILABLE: 503,
  TIMEOUT: 504,
  CACHE_CORRUPTION: 500,
  // Nobody reads it; the client has already disconnected
  REQUEST_CANCELLED: 499,
};

export function sendError(reply: FastifyReply, error: unknown, log: FastifyBaseLogger) {
  if (isEngineError(error)) {
    const body: ErrorBody = { error: error.name, code: error.code, message: error.message };
    if (error instanceof QueryNotUnderstood) {
      body.matched = error.matched.map((entity) => ({
        phrase: entity.phrase,
        kind: entity.binding.kind,
        confidence: entity.confidence,
      }));
      body.unmatched = [...error.unmatched];
    }
    const status = STATUS_BY_CODE[error.code];
    if (error instanceof RequestCancelled) log.debug("client disconnected before the answer was ready");
    else if (status >= 500) log.warn({ code: error.code, err: error.message }, "request failed");
    return reply.code(status).send(body);
  }

  const err = toError(error);
  log.error({ err }, "unexpected failure");
  const body: ErrorBody = { error: "InternalError", code: "INTERNAL_ERROR", message: "Internal server error" };
  return reply.code(500).send(body);
}

export function sendValidationError(reply: FastifyReply, error: ZodError) {
  const body: ErrorBody = {
    error: "ValidationError",
    code: "VALIDATION_ERROR",
    message: error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; "),
  };
  return reply.code(400).send(body);
}
