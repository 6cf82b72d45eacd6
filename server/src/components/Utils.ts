/**
 * Returns a human-readable error message from an unknown error value.
 *
 * - If the error is an instance of `Error`, returns its message.
 * - If the error is a string, returns the string itself.
 * - Otherwise, returns a generic unexpected error message.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "An unexpected error occurred.";
}

/**
 * Renders a boolean as a check or cross for status logs.
 */
export const mark = (value: boolean): string => (value ? "✓" : "✗");
