/**
 * Error types raised by the data pipeline
 * Route handlers map these to 400 responses; anything else is a 500
 */

/**
 * A filter, group-by or trend request references a field the dataset
 * does not have, or uses a field of the wrong kind
 */
export class InvalidPredicateError extends Error {
  readonly field: string;

  constructor(field: string, reason = 'is not a field of this dataset') {
    super(`Invalid field "${field}": ${reason}`);
    this.name = 'InvalidPredicateError';
    this.field = field;
  }
}

/**
 * Generator parameters or vocabularies that cannot produce a dataset
 */
export class DatasetConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DatasetConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
