import type { CommandOutput } from "../types/command-output";
import { errorCodeOf } from "./errors";

export const buildErrorOutput = (
  error: Error,
  message?: string
): CommandOutput => {
  return {
    success: false,
    error,
    code: errorCodeOf(error) ?? "InternalError",
    message: message ? `${message}: ${error.message}` : error.message,
  };
};
