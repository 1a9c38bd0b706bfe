/**
 * Error codes libuv reports when another handle holds a file in a way that
 * blocks ours (Windows sharing and lock violations surface as EBUSY).
 */
const FILE_IN_USE_CODES = new Set(['EBUSY', 'ETXTBSY']);

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function isFileInUse(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && FILE_IN_USE_CODES.has(code);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
