import type { ZodError, ZodIssue } from 'zod';

/**
 * Represents a single validation issue.
 */
export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

/**
 * Error thrown when an input is malformed: negative distances, a point count
 * below one, coordinates out of range.
 */
export class InvalidInputError extends Error {
  readonly code = 'INVALID_INPUT';
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[]) {
    super(message);
    this.name = 'InvalidInputError';
    this.issues = issues;
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }

  /**
   * Create an InvalidInputError from a Zod error.
   */
  static fromZodError(error: ZodError): InvalidInputError {
    const issues = error.issues.map((issue: ZodIssue) => ({
      path: issue.path.join('.'),
      message: issue.message,
      code: issue.code,
    }));

    const paths = issues.map((i) => i.path || 'value').join(', ');
    const message = `Invalid input for: ${paths}`;

    return new InvalidInputError(message, issues);
  }

  /**
   * Create an InvalidInputError for a single offending field.
   */
  static forField(path: string, message: string): InvalidInputError {
    return new InvalidInputError(`Invalid input for: ${path} (${message})`, [
      { path, message, code: 'custom' },
    ]);
  }

  /**
   * Get a formatted string representation of all issues.
   */
  getFormattedIssues(): string {
    return this.issues
      .map((issue) => `  - ${issue.path || 'value'}: ${issue.message}`)
      .join('\n');
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): { code: string; message: string; issues: ValidationIssue[] } {
    return {
      code: this.code,
      message: this.message,
      issues: this.issues,
    };
  }
}
