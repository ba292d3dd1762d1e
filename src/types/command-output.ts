import type { ErrorCode } from "../core/errors";

export interface CommandOutput {
  success: boolean;
  data?: unknown;
  error?: Error;
  code?: ErrorCode | "InternalError";
  message?: string;
  meta?: Record<string, unknown>;
}
