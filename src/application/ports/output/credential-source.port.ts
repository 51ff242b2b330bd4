export const CREDENTIAL_SOURCES = 'CredentialSources';

export type CredentialField = 'accessKeyId' | 'secretAccessKey' | 'region';

/**
 * Whatever subset of the credential triple a source could supply
 */
export type CredentialFields = Partial<Record<CredentialField, string>>;

/**
 * Credential Source Port (Driven Port)
 * A non-interactive place credentials may come from (environment, .env file).
 * Sources are consulted in the order they are registered.
 */
export interface CredentialSourcePort {
  /**
   * Human-readable name used in debug logs
   */
  readonly name: string;

  /**
   * Read the fields this source knows about. Never rejects for a missing or
   * unreadable source; it simply returns no fields.
   */
  read(): Promise<CredentialFields>;
}
