/**
 * Structural problem with an uploaded file (empty file, missing required
 * column). Raised before any reconciliation happens.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    readonly file: string,
    readonly missingColumns: string[] = [],
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
