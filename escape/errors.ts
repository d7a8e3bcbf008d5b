/** Raised when a caller passes a missing or unknown option, or a bad offset/length. */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/** Raised while building a reference table from malformed reference data. */
export class ReferenceTableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReferenceTableError';
  }
}
