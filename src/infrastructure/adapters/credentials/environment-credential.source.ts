import {
  CredentialFields,
  CredentialSourcePort,
} from '../../../application/ports/output/credential-source.port';
import { DEFAULT_AWS_REGION } from '../../../config/configuration';

/**
 * Reads credentials from process environment variables.
 * Each field accepts two names; the first non-empty one wins.
 * Region always resolves here, so a region in a .env file never applies.
 */
export class EnvironmentCredentialSource implements CredentialSourcePort {
  readonly name = 'environment';

  constructor(private readonly env: NodeJS.ProcessEnv) {}

  async read(): Promise<CredentialFields> {
    return {
      accessKeyId: this.pick('AWS_KEY', 'AWS_ACCESS_KEY_ID'),
      secretAccessKey: this.pick('AWS_SECRET', 'AWS_SECRET_ACCESS_KEY'),
      region: this.pick('AWS_REGION', 'AWS_DEFAULT_REGION') ?? DEFAULT_AWS_REGION,
    };
  }

  private pick(...names: string[]): string | undefined {
    for (const name of names) {
      const value = this.env[name]?.trim();
      if (value) {
        return value;
      }
    }
    return undefined;
  }
}
