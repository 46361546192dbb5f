import { isNsmError } from "@/errors";
import { Logger, SessionCallbacks, SessionOperation } from "@/session/types";

/**
 * Handles errors in a consistent way across session operations.
 * Every error reaches `onError`; errors that are not part of the module
 * contract are also logged as warnings. The caller rethrows afterwards.
 *
 * @param error - The error that occurred
 * @param callbacks - The callbacks object containing error handlers
 * @param operation - The operation being performed when the error occurred
 * @param logger - Where unexpected errors are reported
 */
export function handleSessionError(
  error: unknown,
  callbacks: SessionCallbacks,
  operation: SessionOperation,
  logger: Logger = console
) {
  if (!isNsmError(error)) {
    logger.warn(`Unexpected error during ${operation}:`, error);
  }
  callbacks.onError?.(error, operation);
}
