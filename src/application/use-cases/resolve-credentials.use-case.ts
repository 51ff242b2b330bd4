import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ResolveCredentialsCommand,
  ResolveCredentialsPort,
  ResolveCredentialsResult,
  CredentialOrigin,
} from '../ports/input/resolve-credentials.port';
import {
  CREDENTIAL_SOURCES,
  CredentialField,
  CredentialFields,
  CredentialSourcePort,
} from '../ports/output/credential-source.port';
import {
  CREDENTIAL_PROMPT_PORT,
  CredentialPromptPort,
} from '../ports/output/credential-prompt.port';
import { AwsCredentialsVO } from '../../domain/value-objects/aws-credentials.vo';
import { CredentialsError } from '../../domain/errors/credentials.error';
import { DEFAULT_AWS_REGION } from '../../config/configuration';

const FIELDS: readonly CredentialField[] = ['accessKeyId', 'secretAccessKey', 'region'];

/**
 * Resolve Credentials Use Case
 *
 * Precedence, first non-empty value wins per field:
 * 1. command line (key + secret together bypass everything else)
 * 2. registered credential sources, in order (environment, then .env file)
 * 3. interactive prompt for the key and secret
 * Region falls back to us-east-1.
 */
@Injectable()
export class ResolveCredentialsUseCase implements ResolveCredentialsPort {
  private readonly logger = new Logger(ResolveCredentialsUseCase.name);

  constructor(
    @Inject(CREDENTIAL_SOURCES)
    private readonly sources: CredentialSourcePort[],
    @Inject(CREDENTIAL_PROMPT_PORT)
    private readonly prompt: CredentialPromptPort,
  ) {}

  async execute(command: ResolveCredentialsCommand): Promise<ResolveCredentialsResult> {
    if (command.accessKeyId && command.secretAccessKey) {
      this.logger.debug('Using credentials supplied on the command line');
      return this.build(
        {
          accessKeyId: command.accessKeyId,
          secretAccessKey: command.secretAccessKey,
          region: command.region || DEFAULT_AWS_REGION,
        },
        {
          accessKeyId: 'cli',
          secretAccessKey: 'cli',
          region: command.region ? 'cli' : 'default',
        },
      );
    }

    const values: CredentialFields = {};
    const origins: Partial<Record<CredentialField, CredentialOrigin>> = {};
    this.merge(values, origins, command, 'cli');

    for (const source of this.sources) {
      if (this.isComplete(values)) {
        break;
      }
      const found = await source.read();
      this.merge(values, origins, found, source.name);
    }

    const missing = (['accessKeyId', 'secretAccessKey'] as const).filter(
      (field) => !values[field],
    );
    if (missing.length > 0) {
      this.logger.debug(`Prompting for missing credentials: ${missing.join(', ')}`);
      const answered = await this.prompt.prompt(missing);
      this.merge(values, origins, answered, 'prompt');
    }

    if (!values.region) {
      values.region = DEFAULT_AWS_REGION;
      origins.region = 'default';
    }

    if (!values.accessKeyId || !values.secretAccessKey) {
      throw new CredentialsError('AWS access key ID and secret access key are required');
    }

    return this.build(
      {
        accessKeyId: values.accessKeyId,
        secretAccessKey: values.secretAccessKey,
        region: values.region,
      },
      {
        accessKeyId: origins.accessKeyId ?? 'prompt',
        secretAccessKey: origins.secretAccessKey ?? 'prompt',
        region: origins.region ?? 'default',
      },
    );
  }

  private merge(
    values: CredentialFields,
    origins: Partial<Record<CredentialField, CredentialOrigin>>,
    found: CredentialFields,
    origin: CredentialOrigin,
  ): void {
    for (const field of FIELDS) {
      const value = found[field]?.trim();
      if (!values[field] && value) {
        values[field] = value;
        origins[field] = origin;
      }
    }
  }

  private isComplete(values: CredentialFields): boolean {
    return FIELDS.every((field) => Boolean(values[field]));
  }

  private build(
    values: { accessKeyId: string; secretAccessKey: string; region: string },
    origins: Record<CredentialField, CredentialOrigin>,
  ): ResolveCredentialsResult {
    let credentials: AwsCredentialsVO;
    try {
      credentials = AwsCredentialsVO.create(values);
    } catch (error) {
      throw new CredentialsError(
        error instanceof Error ? error.message : 'Invalid AWS credentials',
        { cause: error },
      );
    }

    this.logger.debug(
      `Resolved credentials (key: ${origins.accessKeyId}, secret: ${origins.secretAccessKey}, region: ${origins.region})`,
    );

    return { credentials, origins };
  }
}
