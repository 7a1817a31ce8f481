/**
 * Validation Utilities
 *
 * Common validation helpers used across services
 */

import { type } from 'arktype';

/**
 * Converts an arktype validation result into the validated value
 * or a standardized errors object
 *
 * @example
 * ```typescript
 * const loginBody = type({ email: 'string.email', password: 'string > 0' });
 *
 * const result = validateInput(loginBody(body));
 * if ('errors' in result) {
 *   throw new ServiceError('ValidationFailed', result.errors.join('; '));
 * }
 * ```
 */
export function validateInput<T>(
  schemaResult: T | InstanceType<typeof type.errors>
): T | { errors: string[] } {
  if (schemaResult instanceof type.errors) {
    return { errors: [schemaResult.summary] };
  }

  return schemaResult;
}
