import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

// Shared services
import { ConfigModule } from '../config/config.module';
import { AppConfig } from '../config/configuration';
import { S3Module } from '../shared/aws/s3/s3.module';
import { LoggingModule } from '../shared/logging/logging.module';

// Port tokens
import { OBJECT_STORE_PORT } from '../application/ports/output/object-store.port';
import { CREDENTIAL_SOURCES } from '../application/ports/output/credential-source.port';
import { CREDENTIAL_PROMPT_PORT } from '../application/ports/output/credential-prompt.port';
import { DOWNLOAD_REPORTER_PORT } from '../application/ports/output/download-reporter.port';

// Adapters (implementations)
import { S3ObjectStoreAdapter } from './adapters/storage/s3-object-store.adapter';
import { EnvironmentCredentialSource } from './adapters/credentials/environment-credential.source';
import { EnvFileCredentialSource } from './adapters/credentials/env-file-credential.source';
import { PromptsCredentialPrompt } from './adapters/credentials/prompts-credential.prompt';
import { ConsoleReporterAdapter } from './adapters/reporting/console-reporter.adapter';

/**
 * Infrastructure Module
 * Binds every output port token to its adapter
 */
@Module({
  imports: [ConfigModule, LoggingModule, S3Module],
  providers: [
    // Storage adapter
    S3ObjectStoreAdapter,
    {
      provide: OBJECT_STORE_PORT,
      useExisting: S3ObjectStoreAdapter,
    },

    // Credential sources, consulted in this order
    {
      provide: CREDENTIAL_SOURCES,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig>) => [
        new EnvironmentCredentialSource(process.env),
        new EnvFileCredentialSource(
          configService.getOrThrow('credentials', { infer: true }).envFileCandidates,
        ),
      ],
    },
    {
      provide: CREDENTIAL_PROMPT_PORT,
      useClass: PromptsCredentialPrompt,
    },

    // Reporting adapter
    {
      provide: DOWNLOAD_REPORTER_PORT,
      useClass: ConsoleReporterAdapter,
    },
  ],
  exports: [OBJECT_STORE_PORT, CREDENTIAL_SOURCES, CREDENTIAL_PROMPT_PORT, DOWNLOAD_REPORTER_PORT],
})
export class InfrastructureModule {}
