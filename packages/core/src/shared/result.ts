import { LinedeskError, describeError, type ErrorCategory } from './errors.js';

/**
 * Uniform envelope returned by every facade operation.
 * Remote business rejections are successes carrying a rejection status;
 * everything else that fails produces `success: false`.
 */
export type Result<T> =
  | { success: true; data: T }
  | { success: false; error: string; errorCategory: ErrorCategory };

export type Failure = Extract<Result<never>, { success: false }>;

export function ok<T>(data: T): Result<T> {
  return { success: true, data };
}

export function fail(error: unknown): Failure {
  const errorCategory: ErrorCategory = error instanceof LinedeskError ? error.category : 'internal';
  return { success: false, error: describeError(error), errorCategory };
}

export async function toResult<T>(operation: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await operation());
  } catch (error) {
    return fail(error);
  }
}
