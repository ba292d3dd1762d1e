import { UpstreamError } from "../core/errors";
import { isRecord } from "../utils/validation";

/**
 * gitbeaker rejects with an Error whose `cause` carries the fetch Response and
 * GitLab's error description; network failures and timeouts carry neither.
 */
const causeOf = (err: unknown): Record<string, unknown> | undefined =>
  err instanceof Error && isRecord(err.cause) ? err.cause : undefined;

export const upstreamStatus = (err: unknown): number | undefined => {
  if (err instanceof UpstreamError) {
    return err.status;
  }
  const response = causeOf(err)?.response;
  return response instanceof Response ? response.status : undefined;
};

/** Retry-After is either delay-seconds or an HTTP date. */
export const parseRetryAfter = (value: string | null, now: Date = new Date()): number | undefined => {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, Math.ceil((date - now.getTime()) / 1000));
};

const detailOf = (err: unknown): string => {
  const description = causeOf(err)?.description;
  if (typeof description === "string" && description.trim()) {
    return description;
  }
  return err instanceof Error ? err.message : String(err);
};

export function toUpstreamError(err: unknown, action: string): UpstreamError {
  if (err instanceof UpstreamError) {
    return err;
  }

  const response = causeOf(err)?.response;
  const status = response instanceof Response ? response.status : undefined;
  const retryAfter = response instanceof Response ? parseRetryAfter(response.headers.get("retry-after")) : undefined;
  const detail = detailOf(err);

  const message =
    status === undefined
      ? `Failed to ${action}: ${detail}`
      : `Failed to ${action}: GitLab responded ${status}: ${detail}`;

  return new UpstreamError(message, { status, retryAfter, cause: err });
}
