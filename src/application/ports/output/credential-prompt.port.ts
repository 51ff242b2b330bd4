import { CredentialField, CredentialFields } from './credential-source.port';

export const CREDENTIAL_PROMPT_PORT = 'CredentialPromptPort';

/**
 * Region is never asked for; it has a default
 */
export type PromptedField = Exclude<CredentialField, 'region'>;

/**
 * Credential Prompt Port (Driven Port)
 * Asks the operator for whatever is still missing after every source was read.
 */
export interface CredentialPromptPort {
  /**
   * Ask for each of `missing`. Secrets are read without echo.
   * Rejects when the operator cancels.
   */
  prompt(missing: PromptedField[]): Promise<CredentialFields>;
}
