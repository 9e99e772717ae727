/**
 * Loader errors.
 */

/**
 * A catalog source file could not be read or has the wrong shape.
 */
export class CatalogLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to load catalog file '${filePath}': ${message}`, options);
    this.name = 'CatalogLoadError';
  }
}
