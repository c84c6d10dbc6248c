import type { Terminal } from "../ui/terminal.js";
import { getErrorMessage } from "../utils/error-utils.js";
import { createLogger } from "../utils/logger.js";
import type { ErrorCode } from "./error-codes.js";

const log = createLogger("error-handler");

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

/**
 * Error raised for every condition the planner reports to the user.
 * `hints` are extra lines printed under the labeled message.
 */
export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    public readonly hints: string[] = []
  ) {
    super(message);
    this.name = "AppError";
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

/**
 * Print a fatal error as a short labeled line (plus any hints) and return the exit status.
 * Stack traces and details only reach the debug log.
 */
export function reportFatalError(terminal: Terminal, label: string, err: unknown): number {
  log.debug("Fatal error", {
    label,
    code: isAppError(err) ? err.code : undefined,
    details: isAppError(err) ? err.details : undefined,
    stack: err instanceof Error ? err.stack : undefined,
  });
  terminal.error(label, getErrorMessage(err));
  if (isAppError(err)) {
    for (const hint of err.hints) terminal.info(hint);
  }
  return EXIT_FAILURE;
}
