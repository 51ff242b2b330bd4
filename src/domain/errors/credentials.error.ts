/**
 * Raised when AWS credentials are missing after every source was consulted,
 * or when the object store rejects them.
 */
export class CredentialsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CredentialsError';
  }
}
