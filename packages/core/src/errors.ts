/**
 * Error hierarchy shared by the engines.
 *
 * Data findings (unknown concepts, broken extension chains, non-numeric
 * duplicates) are never thrown. Errors are reserved for missing or corrupt
 * required input and for internal invariant violations, and carry the filing
 * id so a batch runner can skip one filing and keep going.
 */

export class ArbiterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArbiterError';
  }
}

export class FilingError extends ArbiterError {
  constructor(
    message: string,
    public readonly filingId: string,
    public readonly concept?: string,
  ) {
    super(message);
    this.name = 'FilingError';
  }
}

/** A required input (fact list, statement set, taxonomy) is absent or unreadable. */
export class MissingInputError extends FilingError {
  constructor(
    message: string,
    filingId: string,
    public readonly input: string,
  ) {
    super(message, filingId);
    this.name = 'MissingInputError';
  }
}

export class InvariantViolationError extends FilingError {
  constructor(message: string, filingId: string, concept?: string) {
    super(message, filingId, concept);
    this.name = 'InvariantViolationError';
  }
}

export function isFilingError(error: unknown): error is FilingError {
  return error instanceof FilingError;
}
