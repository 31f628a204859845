/**
 * DocumentParseError
 *
 * Base error class for document parsing failures.
 */
export class DocumentParseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DocumentParseError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create DocumentParseError from unknown error with context
   */
  static fromError(context: string, error: unknown): DocumentParseError {
    return new DocumentParseError(
      `${context}: ${DocumentParseError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * ParserConfigurationError
 *
 * Thrown before any network attempt when a required setting is missing.
 */
export class ParserConfigurationError extends DocumentParseError {
  constructor(message: string) {
    super(message);
    this.name = 'ParserConfigurationError';
  }
}

/**
 * ParseInputError
 *
 * Thrown when the input file does not exist or cannot be read.
 */
export class ParseInputError extends DocumentParseError {
  readonly filePath: string;

  constructor(filePath: string, options?: ErrorOptions) {
    super(`File not found: ${filePath}`, options);
    this.name = 'ParseInputError';
    this.filePath = filePath;
  }
}

/**
 * ParseRequestError
 *
 * Thrown when the Document Parse API answers with a non-success status.
 */
export class ParseRequestError extends DocumentParseError {
  readonly status: number;
  readonly responseText: string;

  constructor(status: number, responseText: string) {
    super(`Document Parse API error: ${status} - ${responseText}`);
    this.name = 'ParseRequestError';
    this.status = status;
    this.responseText = responseText;
  }
}
