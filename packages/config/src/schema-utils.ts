/**
 * Zod Schema Utilities
 *
 * Shared validation helpers for consistent error formatting.
 *
 * @packageDocumentation
 */

import type { z } from 'zod';

/**
 * Create a validator that reports errors instead of throwing
 *
 * Error messages include the full path (e.g., "git.env.GIT_DIR: ...").
 *
 * @example
 * ```typescript
 * const result = safeValidateConfig(data);
 * if (result.success) {
 *   console.log(result.data.git.binary);
 * } else {
 *   console.error(result.errors.join('\n'));
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

    const errors = result.error.errors.map(err => {
      const path = err.path.join('.');
      return path ? `${path}: ${err.message}` : err.message;
    });

    return { success: false, errors };
  };
}

/**
 * Create a validator that throws a ZodError on invalid input
 */
export function createStrictValidator<T extends z.ZodType>(schema: T) {
  return function validate(data: unknown): z.infer<T> {
    return schema.parse(data);
  };
}
