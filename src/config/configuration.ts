/**
 * Application Configuration
 *
 * Loads and validates environment variables, providing type-safe access
 * to configuration values throughout the application.
 *
 * ## Configuration Sources:
 * 1. Environment variables (system environment)
 * 2. Validated by Zod schema in `validation.schema.ts`
 * 3. Transformed into typed AppConfig object
 *
 * AWS credentials are deliberately absent here: they are resolved per run by
 * `ResolveCredentialsUseCase`, which also consults CLI flags, `.env` files and
 * an interactive prompt.
 *
 * ## Usage:
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig>) {}
 *
 * const model = this.configService.getOrThrow('model', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { homedir } from 'os';
import { join, resolve } from 'path';
import { validateEnv, EnvConfig } from './validation.schema';

export const DEFAULT_AWS_REGION = 'us-east-1';

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  aws: {
    endpoint?: string;
  };
  model: {
    bucket: string;
    prefix: string;
    defaultDirectory: string;
  };
  /**
   * Credential discovery settings.
   *
   * `envFileCandidates` are searched in order and only the first existing
   * file is read: the working directory, one level above the tool's own
   * directory, then the home directory.
   */
  credentials: {
    envFileCandidates: string[];
  };
}

export function defaultModelDirectory(): string {
  return join(homedir(), 'Documents', 'RFQ_Models', 'Mistral-7B-Instruct-v0-3');
}

export function envFileCandidates(): string[] {
  return [
    join(process.cwd(), '.env'),
    // src/config (or dist/config) -> package root
    resolve(__dirname, '..', '..', '.env'),
    join(homedir(), '.env'),
  ];
}

export default (): AppConfig => {
  const env: EnvConfig = validateEnv(process.env);

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    aws: {
      endpoint: env.AWS_ENDPOINT,
    },
    model: {
      bucket: env.MODEL_BUCKET,
      prefix: env.MODEL_PREFIX,
      defaultDirectory: env.MODEL_DIR ?? defaultModelDirectory(),
    },
    credentials: {
      envFileCandidates: envFileCandidates(),
    },
  };
};
