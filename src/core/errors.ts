import type { NamespaceKind } from "../models/gitlab";
import { ValidationError } from "../utils/validation";

export type ErrorCode =
  | "ValidationError"
  | "TargetNotFound"
  | "UserNotFound"
  | "UpstreamError"
  | "ConfigError";

export class TargetNotFoundError extends Error {
  readonly code = "TargetNotFound";

  constructor(
    readonly target: string,
    readonly tried: NamespaceKind[] = ["group", "project"],
  ) {
    super(`Target '${target}' not found as ${tried.join(" or ")}`);
    this.name = "TargetNotFoundError";
  }
}

export class UserNotFoundError extends Error {
  readonly code = "UserNotFound";

  constructor(readonly username: string) {
    super(`User '${username}' not found`);
    this.name = "UserNotFoundError";
  }
}

export interface UpstreamErrorDetails {
  status?: number;
  retryAfter?: number;
  cause?: unknown;
}

export class UpstreamError extends Error {
  readonly code = "UpstreamError";
  readonly status?: number;
  /** Seconds, taken from the platform's Retry-After header. */
  readonly retryAfter?: number;

  constructor(message: string, details: UpstreamErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "UpstreamError";
    this.status = details.status;
    this.retryAfter = details.retryAfter;
  }
}

export class ConfigError extends Error {
  readonly code = "ConfigError";

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const errorCodeOf = (err: unknown): ErrorCode | undefined => {
  if (
    err instanceof ValidationError ||
    err instanceof TargetNotFoundError ||
    err instanceof UserNotFoundError ||
    err instanceof UpstreamError ||
    err instanceof ConfigError
  ) {
    return err.code;
  }
  return undefined;
};
