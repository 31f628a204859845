/**
 * CurationError
 *
 * Base error class for curation failures.
 */
export class CurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CurationError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create CurationError from unknown error with context
   */
  static fromError(context: string, error: unknown): CurationError {
    return new CurationError(
      `${context}: ${CurationError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * JudgeConfigurationError
 *
 * Thrown when an LLM call is attempted without a configured model.
 */
export class JudgeConfigurationError extends CurationError {
  constructor(message: string) {
    super(message);
    this.name = 'JudgeConfigurationError';
  }
}

/**
 * CurationJobNotFoundError
 *
 * Thrown when a job id is not present in the job map.
 */
export class CurationJobNotFoundError extends CurationError {
  readonly jobId: string;

  constructor(jobId: string) {
    super(`Curation job not found: ${jobId}`);
    this.name = 'CurationJobNotFoundError';
    this.jobId = jobId;
  }
}
