/**
 * Thrown when the XSD file cannot be read or parsed.
 */
export class XsdParseError extends Error {
  // Explicit declaration needed as Error.cause requires lib ES2022+.
  public readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'XsdParseError';
    this.cause = cause;
    Object.setPrototypeOf(this, XsdParseError.prototype);
  }
}

/**
 * Thrown when no top-level element references a complex type with child
 * elements, so there is nowhere to start the hierarchy walk.
 */
export class RootResolutionError extends Error {
  public readonly candidates: string[];

  constructor(candidates: string[]) {
    const listed = candidates.length > 0 ? candidates.join(', ') : '(none)';
    super(`No resolvable root element: no top-level element has a complex type with children. Top-level elements: ${listed}`);
    this.name = 'RootResolutionError';
    this.candidates = candidates;
    Object.setPrototypeOf(this, RootResolutionError.prototype);
  }
}

/**
 * Thrown when the walk from the root produced no leaf element at all.
 */
export class EmptyCatalogError extends Error {
  public readonly rootElement: string;

  constructor(rootElement: string) {
    super(`No leaf elements found below root element "${rootElement}".`);
    this.name = 'EmptyCatalogError';
    this.rootElement = rootElement;
    Object.setPrototypeOf(this, EmptyCatalogError.prototype);
  }
}

/**
 * Thrown when a complex type contains itself, directly or through descendants.
 */
export class RecursiveTypeError extends Error {
  /** Type names from the root down to the repeated one. */
  public readonly typePath: string[];

  constructor(typePath: string[]) {
    super(`Recursive type reference: ${typePath.join(' -> ')}`);
    this.name = 'RecursiveTypeError';
    this.typePath = typePath;
    Object.setPrototypeOf(this, RecursiveTypeError.prototype);
  }
}
