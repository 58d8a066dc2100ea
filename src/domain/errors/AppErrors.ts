/**
 * Base class for all domain errors.
 */
export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised when the same action keeps repeating without effect.
 */
export class LoopGuardError extends DomainError {
  constructor(
    public readonly action: string,
    public readonly limit: number
  ) {
    super(`too many repeated actions: ${action} (limit: ${limit}). Try a different action`);
  }
}

/**
 * Raised when a decision service response cannot be turned into a valid decision.
 */
export class DecisionParseError extends DomainError {
  constructor(
    message: string,
    public readonly rawResponse?: string
  ) {
    super(message);
  }
}

/**
 * Raised when the decision service cannot be reached or rejects the request.
 */
export class DecisionServiceError extends DomainError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly retryable: boolean,
    public readonly status?: number
  ) {
    super(`LLM Error (${provider}): ${message}`);
  }
}

/**
 * Raised when the task used up its step budget.
 */
export class StepLimitError extends DomainError {
  constructor(public readonly maxSteps: number) {
    super('step limit reached');
  }
}

/**
 * Raised when the caller cancelled the task.
 */
export class TaskCancelledError extends DomainError {
  constructor(reason = 'task cancelled') {
    super(reason);
  }
}

/**
 * Raised when an index does not address any element of the current snapshot.
 */
export class ElementNotFoundError extends DomainError {
  constructor(
    public readonly index: number,
    public readonly available: number[]
  ) {
    super(`element not found: index ${index} (available: ${available.join(', ') || 'none'})`);
  }
}

/**
 * Raised when an outbound payload exceeds its cap and overflow is configured to fail.
 */
export class PayloadTooLargeError extends DomainError {
  constructor(
    public readonly field: string,
    public readonly size: number,
    public readonly limit: number
  ) {
    super(`${field} is ${size} bytes, over the ${limit} byte limit`);
  }
}

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigurationError extends DomainError {
  constructor(message: string) {
    super(`Configuration Error: ${message}`);
  }
}

/**
 * Raised when an action's input fails validation.
 */
export class InvalidActionInputError extends DomainError {
  constructor(
    public readonly action: string,
    message: string
  ) {
    super(message);
  }
}

/**
 * Extracts a message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
