/**
 * Raised while loading a pattern catalog. The message names the offending
 * rule so the catalog file can be fixed without reading code.
 */
export class CatalogError extends Error {
  constructor(message: string, readonly ruleRef?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CatalogError';
  }
}

/** The annotator could not process the input text. Terminal for that call. */
export class AnnotatorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AnnotatorError';
  }
}
