/**
 * Helpers for turning unknown thrown values into messages.
 */

/**
 * Extracts a string message from any error value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
