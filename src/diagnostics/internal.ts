const INTERNAL_ERROR_NAME = 'InternalParserError';

/**
 * Abort on a parser defect.
 *
 * These are never diagnostics: no input, well-formed or not, should reach them.
 */
export function internalError(message: string): never {
  throw Object.assign(new Error(message), { name: INTERNAL_ERROR_NAME });
}

export function isInternalParserError(err: unknown): err is Error {
  return err instanceof Error && err.name === INTERNAL_ERROR_NAME;
}
