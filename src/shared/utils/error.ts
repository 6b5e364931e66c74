/**
 * Error helpers
 */

/** Extract a human-readable message from an unknown thrown value */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
