import type { ZodError } from 'zod';

export class ConfigValidationError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

/**
 * One `path: message` line per zod issue.
 */
export function formatZodIssues(error: ZodError, describe?: (path: string) => string): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
    let message = issue.message;

    if (issue.code === 'invalid_type') {
      message = `Expected ${issue.expected}, but received ${issue.received}`;
    } else if (issue.code === 'invalid_enum_value') {
      message = `Invalid value. Expected one of: ${issue.options.join(', ')}`;
    } else if (issue.code === 'unrecognized_keys') {
      message = `Unrecognized key(s): ${issue.keys.join(', ')}`;
    } else if (issue.code === 'invalid_literal') {
      message = `Must be exactly: ${String(issue.expected)}`;
    }

    const context = describe?.(path);
    return context ? `${path}: ${message}\n    → ${context}` : `${path}: ${message}`;
  });
}
