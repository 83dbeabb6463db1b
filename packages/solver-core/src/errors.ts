// packages/solver-core/src/errors.ts

/** The word list could not be read, or held no usable words. Fatal at boot. */
export class DictionaryLoadError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`Cannot load dictionary ${path}: ${message}`, options);
    this.name = 'DictionaryLoadError';
    this.path = path;
  }
}
