import {
  ConfigError,
  TargetNotFoundError,
  UpstreamError,
  UserNotFoundError,
} from "../core/errors";
import type { ErrorCode } from "../core/errors";
import { ValidationError } from "../utils/validation";

export interface ErrorBody {
  status: "error";
  code: ErrorCode | "NotFound" | "InternalError";
  message: string;
  issues?: string[];
  upstream_status?: number;
  retry_after?: number;
}

export interface ErrorResponse {
  statusCode: number;
  body: ErrorBody;
}

const isClientError = (err: unknown): boolean => {
  if (typeof err !== "object" || err === null || !("statusCode" in err)) {
    return false;
  }
  const { statusCode } = err;
  return typeof statusCode === "number" && statusCode >= 400 && statusCode < 500;
};

export function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof ValidationError) {
    return {
      statusCode: 400,
      body: { status: "error", code: err.code, message: err.message, issues: err.issues },
    };
  }
  if (err instanceof TargetNotFoundError || err instanceof UserNotFoundError) {
    return { statusCode: 404, body: { status: "error", code: err.code, message: err.message } };
  }
  if (err instanceof UpstreamError) {
    const body: ErrorBody = { status: "error", code: err.code, message: err.message };
    if (err.status !== undefined) body.upstream_status = err.status;
    if (err.retryAfter !== undefined) body.retry_after = err.retryAfter;
    return { statusCode: 502, body };
  }

  // Framework client errors, such as malformed JSON or an unsupported media type, are bad input.
  if (isClientError(err)) {
    const message = err instanceof Error ? err.message : "Bad request";
    return {
      statusCode: 400,
      body: { status: "error", code: "ValidationError", message, issues: [message] },
    };
  }

  return {
    statusCode: 500,
    body: {
      status: "error",
      code: err instanceof ConfigError ? err.code : "InternalError",
      message: "Internal server error",
    },
  };
}
