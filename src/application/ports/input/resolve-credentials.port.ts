import { AwsCredentialsVO } from '../../../domain/value-objects/aws-credentials.vo';
import { CredentialField } from '../output/credential-source.port';

/**
 * Resolve Credentials Command
 * Values passed explicitly on the command line, if any
 */
export interface ResolveCredentialsCommand {
  accessKeyId?: string;
  secretAccessKey?: string;
  region?: string;
}

/**
 * `cli`, `prompt`, `default`, or the name of the credential source
 */
export type CredentialOrigin = string;

/**
 * Resolve Credentials Result
 */
export interface ResolveCredentialsResult {
  credentials: AwsCredentialsVO;
  /**
   * Which source supplied each field
   */
  origins: Record<CredentialField, CredentialOrigin>;
}

/**
 * Resolve Credentials Port (Driving Port / Use Case Interface)
 */
export interface ResolveCredentialsPort {
  execute(command: ResolveCredentialsCommand): Promise<ResolveCredentialsResult>;
}
