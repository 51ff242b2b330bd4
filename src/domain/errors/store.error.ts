/**
 * Store Error
 * Tagged failure returned by the object store abstraction.
 *
 * Callers branch on `kind` instead of on SDK exception classes:
 * - NotFound: the bucket or key does not exist
 * - AccessDenied: the caller lacks permission for the operation
 * - Other: any other service error, `code` carries the service error name
 */
export type StoreErrorKind = 'NotFound' | 'AccessDenied' | 'Other';

export class StoreError extends Error {
  private constructor(
    readonly kind: StoreErrorKind,
    readonly key: string,
    message: string,
    readonly code?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StoreError';
  }

  static notFound(key: string, detail?: string, cause?: unknown): StoreError {
    return new StoreError('NotFound', key, detail ?? `Object not found: ${key}`, 'NotFound', {
      cause,
    });
  }

  static accessDenied(key: string, detail?: string, cause?: unknown): StoreError {
    return new StoreError(
      'AccessDenied',
      key,
      detail ?? `Access denied: ${key}`,
      'AccessDenied',
      { cause },
    );
  }

  static other(key: string, code: string, detail: string, cause?: unknown): StoreError {
    return new StoreError('Other', key, detail, code, { cause });
  }

  isAccessDenied(): boolean {
    return this.kind === 'AccessDenied';
  }

  isNotFound(): boolean {
    return this.kind === 'NotFound';
  }
}

export function isAccessDenied(error: unknown): boolean {
  return error instanceof StoreError && error.isAccessDenied();
}
