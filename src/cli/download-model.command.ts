import { LoggerService } from '@nestjs/common';
import { Command } from 'commander';
import chalk from 'chalk';
import { ResolveCredentialsPort } from '../application/ports/input/resolve-credentials.port';
import { DownloadModelPort } from '../application/ports/input/download-model.port';
import { AppConfig } from '../config/configuration';
import { CredentialsError } from '../domain/errors/credentials.error';
import { NoFilesDownloadedError } from '../domain/errors/no-files-downloaded.error';
import { StoreError } from '../domain/errors/store.error';

export interface DownloadModelCommandDeps {
  resolveCredentials: ResolveCredentialsPort;
  downloadModel: DownloadModelPort;
  model: AppConfig['model'];
  logger: LoggerService;
}

interface DownloadModelOptions {
  modelDir: string;
  awsKey?: string;
  awsSecret?: string;
  awsRegion?: string;
}

/**
 * Print a diagnostic for a failed run and set exit status 1.
 * The process is left to end on its own so the application context closes.
 */
export function handleDownloadError(error: unknown, logger: LoggerService): void {
  console.error('');

  if (error instanceof CredentialsError) {
    console.error(chalk.red('✗ AWS credentials not found or invalid'));
    console.error(chalk.gray('  Please check AWS_KEY, AWS_SECRET, and AWS_REGION'));
    console.error(chalk.gray(`  ${error.message}`));
  } else if (error instanceof NoFilesDownloadedError && error.kind === 'targeted-fetch') {
    console.error(chalk.red('✗ Could not download any files.'));
    console.error('');
    console.error('Required AWS IAM permissions:');
    for (const permission of error.requiredPermissions) {
      console.error(`  - ${permission}`);
    }
    console.error('');
    console.error('Please contact your AWS administrator to grant these permissions.');
  } else if (error instanceof NoFilesDownloadedError) {
    console.error(
      chalk.yellow('⚠ No files found in S3 bucket. Check bucket name and prefix.'),
    );
    console.error(chalk.gray(`  s3://${error.bucket}/${error.prefix}`));
  } else if (error instanceof StoreError) {
    console.error(chalk.red(`✗ AWS S3 error: ${error.message}`));
  } else if (error instanceof Error) {
    console.error(chalk.red(`✗ Failed to download model: ${error.message}`));
    logger.error(error.message, error.stack, 'DownloadModelCommand');
  } else {
    console.error(chalk.red('✗ Failed to download model: an unexpected error occurred'));
    logger.error(String(error), undefined, 'DownloadModelCommand');
  }

  process.exitCode = 1;
}

export function createDownloadModelCommand(deps: DownloadModelCommandDeps): Command {
  return new Command()
    .name('model-fetch')
    .description('Download a pretrained model artifact set from AWS S3')
    .option('--model-dir <path>', 'Directory to download model to', deps.model.defaultDirectory)
    .option('--aws-key <key>', 'AWS Access Key ID')
    .option('--aws-secret <secret>', 'AWS Secret Access Key')
    .option('--aws-region <region>', 'AWS Region (default: us-east-1)')
    .action(async (options: DownloadModelOptions) => {
      try {
        const { credentials } = await deps.resolveCredentials.execute({
          accessKeyId: options.awsKey,
          secretAccessKey: options.awsSecret,
          region: options.awsRegion,
        });

        await deps.downloadModel.execute({
          credentials,
          bucket: deps.model.bucket,
          prefix: deps.model.prefix,
          destination: options.modelDir,
        });
      } catch (error) {
        handleDownloadError(error, deps.logger);
      }
    });
}
