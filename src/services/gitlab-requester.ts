import {
  GitbeakerRequestError,
  createRequesterFn,
  defaultOptionsHandler,
} from "@gitbeaker/requester-utils";
import { isRecord } from "../utils/validation";

type ResponseBody = Record<string, unknown> | Record<string, unknown>[] | string;

const stringHeaders = (raw: unknown): Record<string, string> => {
  const headers: Record<string, string> = {};
  if (isRecord(raw)) {
    for (const [key, value] of Object.entries(raw)) {
      if (typeof value === "string") {
        headers[key] = value;
      }
    }
  }
  return headers;
};

const buildRequest = (endpoint: string, options: unknown, timeoutMs: number): Request => {
  const opts = isRecord(options) ? options : {};
  const prefixUrl = typeof opts.prefixUrl === "string" ? opts.prefixUrl : undefined;
  const base = prefixUrl && !prefixUrl.endsWith("/") ? `${prefixUrl}/` : prefixUrl;

  const url = new URL(endpoint, base);
  if (typeof opts.searchParams === "string") {
    url.search = opts.searchParams;
  }

  const body = typeof opts.body === "string" || opts.body instanceof FormData ? opts.body : undefined;
  return new Request(url, {
    method: typeof opts.method === "string" ? opts.method : "GET",
    headers: stringHeaders(opts.headers),
    body,
    signal: AbortSignal.timeout(timeoutMs),
  });
};

const readBody = async (response: Response): Promise<ResponseBody> => {
  const text = await response.text();
  if (!text || !(response.headers.get("content-type") ?? "").includes("application/json")) {
    return text;
  }
  const parsed: unknown = JSON.parse(text);
  if (Array.isArray(parsed)) {
    return parsed.filter(isRecord);
  }
  return isRecord(parsed) ? parsed : text;
};

/** GitLab reports failures as `{ message }` or `{ error }`; `message` may be a field map. */
const describeFailure = (body: ResponseBody): string => {
  if (typeof body === "string") {
    return body;
  }
  if (Array.isArray(body)) {
    return JSON.stringify(body);
  }
  const detail = body.message ?? body.error;
  return typeof detail === "string" ? detail : JSON.stringify(detail ?? body);
};

/**
 * Sends each call exactly once. Any non-2xx answer, 429 included, rejects with
 * GitbeakerRequestError carrying the Response, so the caller sees the status
 * and Retry-After header.
 */
export async function sendOnce(endpoint: string, options: unknown, timeoutMs: number) {
  const request = buildRequest(endpoint, options, timeoutMs);
  const response = await fetch(request);
  const body = await readBody(response);

  if (!response.ok) {
    throw new GitbeakerRequestError(response.statusText || `HTTP ${response.status}`, {
      cause: { description: describeFailure(body), request, response },
    });
  }

  return {
    body,
    headers: Object.fromEntries(response.headers.entries()),
    status: response.status,
  };
}

export const createGitLabRequester = (timeoutMs: number) =>
  createRequesterFn(defaultOptionsHandler, (endpoint, options) => sendOnce(endpoint, options, timeoutMs));
