/**
 * Message text of a thrown value: the `message` of an Error or error-shaped
 * object, a thrown string as it is, otherwise "Unknown error".
 */
export function getErrorMessage(err: unknown): string {
  if (typeof err === 'string') return err;
  const message = typeof err === 'object' && err !== null && 'message' in err ? err.message : undefined;
  return typeof message === 'string' ? message : 'Unknown error';
}
