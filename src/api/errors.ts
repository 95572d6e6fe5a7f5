/**
 * Lifecycle error utilities.
 *
 * One error type for every public surface (promotion, serving, retraining)
 * plus helpers that convert transport, validation and timeout failures into
 * LifecycleError instances callers can switch on.
 *
 * "No production version" is deliberately absent: it is an expected state
 * and travels as the `NotFound` result variant of the registry client.
 */

import type { ZodError } from 'zod';

export type LifecycleErrorCode =
  | 'RegistryUnavailable'
  | 'ModelUnavailable'
  | 'RetrainJobFailed'
  | 'RetrainJobTimedOut'
  | 'SignalReadError'
  | 'InvalidParams'
  | 'Timeout'
  | 'ConfigError';

/**
 * Plain serialisable shape (JSON responses, log context).
 */
export interface LifecycleErrorShape {
  code: LifecycleErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class LifecycleError extends Error implements LifecycleErrorShape {
  public readonly code: LifecycleErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: LifecycleErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'LifecycleError';
    this.code = code;
    this.details = details;
  }

  public toObject(): LifecycleErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Map unknown errors into LifecycleError instances.
 *
 * @param error - Error thrown by a collaborator
 * @param fallbackCode - Code used when the error carries none of its own
 */
export function toLifecycleError(
  error: unknown,
  fallbackCode: LifecycleErrorCode = 'RegistryUnavailable'
): LifecycleError {
  if (error instanceof LifecycleError) {
    return error;
  }

  if (error instanceof Error) {
    return new LifecycleError(fallbackCode, error.message, { cause: error.name });
  }

  return new LifecycleError(fallbackCode, `Unknown error: ${String(error)}`);
}

export function createTimeoutError(operation: string, timeoutMs: number): LifecycleError {
  return new LifecycleError('Timeout', `Operation timed out after ${timeoutMs}ms: ${operation}`, {
    operation,
    timeoutMs,
  });
}

export function createRegistryUnavailableError(
  message: string,
  details?: Record<string, unknown>
): LifecycleError {
  return new LifecycleError('RegistryUnavailable', message, details);
}

/**
 * Convert a Zod validation error, naming the first offending field.
 *
 * @example
 * ```typescript
 * const parsed = PredictRequestSchema.safeParse(body);
 * if (!parsed.success) {
 *   throw zodErrorToLifecycleError(parsed.error);
 * }
 * // "Validation error on field 'petal_width': Expected number, received string"
 * ```
 */
export function zodErrorToLifecycleError(error: ZodError): LifecycleError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'Invalid input'}`;

  return new LifecycleError('InvalidParams', message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}

/**
 * HTTP status surfaced for an error code by the API server.
 */
export function httpStatusFor(error: LifecycleError): number {
  switch (error.code) {
    case 'InvalidParams':
      return 400;
    case 'ModelUnavailable':
      return 503;
    case 'Timeout':
      return 504;
    default:
      return 500;
  }
}
