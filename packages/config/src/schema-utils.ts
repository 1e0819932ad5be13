/**
 * Zod Schema Utilities
 *
 * Shared validation helpers for consistent error handling across packages.
 *
 * @packageDocumentation
 */

import type { z } from 'zod';

/**
 * Format zod issues as `path: message` strings
 *
 * @example
 * formatZodIssues(error.errors); // ['publish.intervalSecs: Expected number, received string']
 */
export function formatZodIssues(issues: readonly z.ZodIssue[]): string[] {
  return issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Create a type-safe validator function from a Zod schema
 *
 * Error messages include the full path (e.g., "checkpoint.file: Required").
 *
 * @example
 * ```typescript
 * const safeValidate = createSafeValidator(CrateflowConfigSchema);
 *
 * const result = safeValidate(data);
 * if (result.success) {
 *   console.log(result.data);
 * } else {
 *   console.error(result.errors);
 * }
 * ```
 */
export function createSafeValidator<T extends z.ZodType>(schema: T) {
  return function safeValidate(data: unknown):
    | { success: true; data: z.infer<T> }
    | { success: false; errors: string[] } {
    const result = schema.safeParse(data);

    if (result.success) {
      return { success: true, data: result.data };
    }

    return { success: false, errors: formatZodIssues(result.error.errors) };
  };
}

/**
 * Create a strict validator function from a Zod schema
 *
 * Throws ZodError on validation failure.
 */
export function createStrictValidator<T extends z.ZodType>(schema: T) {
  return function validate(data: unknown): z.infer<T> {
    return schema.parse(data);
  };
}
