/**
 * InputValidator
 *
 * Cleans and validates what the operator passes in:
 * - the task text
 * - the step budget
 */

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export const MAX_TASK_LENGTH = 2000;
export const MAX_STEPS_LIMIT = 1000;

// C0 controls except tab and newline, DEL, and C1 controls
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u0008\u000B-\u001F\u007F-\u009F]/g;

/**
 * Validates task inputs.
 */
export class InputValidator {
  /**
   * Trims the task, strips control characters and caps its length.
   */
  static sanitizeTask(task: string): string {
    const cleaned = task.replace(CONTROL_CHARS, '').trim();
    return cleaned.length > MAX_TASK_LENGTH ? cleaned.slice(0, MAX_TASK_LENGTH) : cleaned;
  }

  static validateTask(task: string): ValidationResult {
    if (InputValidator.sanitizeTask(task) === '') {
      return { valid: false, errors: ['task is required'] };
    }
    return { valid: true, errors: [] };
  }

  static validateMaxSteps(maxSteps: number): ValidationResult {
    const errors: string[] = [];
    if (!Number.isInteger(maxSteps) || maxSteps < 1) {
      errors.push('maxSteps must be a positive integer');
    } else if (maxSteps > MAX_STEPS_LIMIT) {
      errors.push(`maxSteps cannot exceed ${MAX_STEPS_LIMIT}`);
    }
    return { valid: errors.length === 0, errors };
  }

  /**
   * Validate all task inputs.
   */
  static validateTaskInputs(task: string, maxSteps: number): ValidationResult {
    const errors = [
      ...InputValidator.validateTask(task).errors,
      ...InputValidator.validateMaxSteps(maxSteps).errors,
    ];
    return { valid: errors.length === 0, errors };
  }
}

/**
 * Validation error class.
 */
export class ValidationError extends Error {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Validation failed: ${errors.join(', ')}`);
    this.name = 'ValidationError';
    this.errors = errors;
  }
}
