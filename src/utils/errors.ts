/**
 * Monitor error taxonomy
 *
 * Only InitError ends a monitor. AuthError and NavigationError are caught at
 * the cycle boundary and answered with backoff; PersistenceError is logged and
 * never reaches the poll loop.
 */

/**
 * The browser-automation resource could not be provisioned.
 */
export class InitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InitError';
  }
}

export type AuthFailureReason = 'invalid_credentials' | 'unreachable' | 'unexpected_page';

/**
 * Login failed. `reason` separates bad credentials from an unreachable login page.
 */
export class AuthError extends Error {
  constructor(
    message: string,
    public readonly reason: AuthFailureReason,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AuthError';
  }
}

/**
 * A page failed to reach the expected state within its bounded wait.
 */
export class NavigationError extends Error {
  constructor(
    message: string,
    public readonly target?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'NavigationError';
  }
}

/**
 * A storage operation failed.
 */
export class PersistenceError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

/**
 * User-supplied filter preferences were rejected.
 */
export class FilterValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid filter: ${issues.join('; ')}`);
    this.name = 'FilterValidationError';
  }
}

/**
 * Extract a message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
