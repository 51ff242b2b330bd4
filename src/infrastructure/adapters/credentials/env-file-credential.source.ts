import { Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import { parse } from 'dotenv';
import {
  CredentialFields,
  CredentialSourcePort,
} from '../../../application/ports/output/credential-source.port';

/**
 * Reads credentials from the first `.env` file that exists among the
 * candidates. Later candidates are never consulted, even when the first file
 * lacks some keys.
 */
export class EnvFileCredentialSource implements CredentialSourcePort {
  readonly name = 'env-file';
  private readonly logger = new Logger(EnvFileCredentialSource.name);

  constructor(private readonly candidates: readonly string[]) {}

  async read(): Promise<CredentialFields> {
    const path = await this.findFirstExisting();
    if (!path) {
      this.logger.debug('No .env file found');
      return {};
    }

    let values: Record<string, string>;
    try {
      values = parse(await fs.readFile(path, 'utf8'));
    } catch (error) {
      this.logger.debug(
        `Ignoring unreadable ${path}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return {};
    }

    this.logger.debug(`Read credentials file ${path}`);

    return {
      accessKeyId: values.AWS_KEY,
      secretAccessKey: values.AWS_SECRET,
      region: values.AWS_REGION,
    };
  }

  private async findFirstExisting(): Promise<string | undefined> {
    for (const candidate of this.candidates) {
      try {
        const stats = await fs.stat(candidate);
        if (stats.isFile()) {
          return candidate;
        }
      } catch (error) {
        this.logger.verbose(
          `No .env at ${candidate}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }
    return undefined;
  }
}
