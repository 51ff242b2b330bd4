import { Injectable } from '@nestjs/common';
import chalk from 'chalk';
import {
  DownloadReporterPort,
  IndexUnavailableReason,
  RunStartedInfo,
} from '../../../application/ports/output/download-reporter.port';
import { DownloadRunEntity } from '../../../domain/entities/download-run.entity';
import { ManifestItemVO } from '../../../domain/value-objects/manifest-item.vo';
import { StoreError } from '../../../domain/errors/store.error';
import { formatGiB, formatMiB } from '../../../shared/utils/format-bytes';

/**
 * Console Reporter Adapter
 * Prints download progress for a human on stdout
 */
@Injectable()
export class ConsoleReporterAdapter implements DownloadReporterPort {
  runStarted(info: RunStartedInfo): void {
    console.log('Starting model download from AWS S3...');
    console.log(chalk.gray(`Bucket: ${info.bucket}`));
    console.log(chalk.gray(`Prefix: ${info.prefix}`));
    console.log(chalk.gray(`Region: ${info.region}`));
    console.log(chalk.gray(`Destination: ${info.destination}`));
    console.log('');
  }

  listingStarted(): void {
    console.log('Listing model files in S3...');
  }

  fileDownloaded(item: ManifestItemVO, options?: { isIndex?: boolean }): void {
    const label = options?.isIndex ? 'Downloaded index file' : 'Downloading';
    console.log(`${label}: ${item.relativePath} (${formatMiB(item.size)} MiB)`);
  }

  objectSkipped(key: string, reason: string): void {
    console.log(chalk.yellow(`  [!] Skipped ${key}: ${reason}`));
  }

  listingDenied(): void {
    console.log('');
    console.log(chalk.yellow('⚠ Access denied when listing bucket contents.'));
    console.log(chalk.gray('  Your IAM user may not have s3:ListBucket permission.'));
    console.log('');
    console.log('Attempting to download common model files directly...');
    console.log(chalk.gray('(This requires s3:GetObject permission)'));
    console.log('');
  }

  indexParsed(fileCount: number): void {
    console.log(`Found ${fileCount} model files in index`);
  }

  indexUnavailable(reason: IndexUnavailableReason, detail?: string): void {
    switch (reason) {
      case 'access-denied':
        console.log('Access denied for index file, trying common files...');
        break;
      case 'not-found':
        console.log('Index file not available, trying common files...');
        break;
      case 'unreadable':
        console.log(`Could not parse index file: ${detail ?? 'unknown error'}`);
        break;
    }
  }

  fileFailed(fileName: string, error: unknown): void {
    if (error instanceof StoreError && error.isAccessDenied()) {
      console.log(chalk.yellow(`  [!] Access denied for: ${fileName}`));
      return;
    }
    const message = error instanceof Error ? error.message : String(error);
    console.log(chalk.yellow(`  [!] Error downloading ${fileName}: ${message}`));
  }

  runCompleted(run: DownloadRunEntity): void {
    console.log('');
    console.log(chalk.green('✓ Model downloaded successfully!'));
    console.log(`Files downloaded: ${run.fileCount}`);
    console.log(`Total size: ${formatGiB(run.totalBytes)} GiB`);
    console.log(`Model location: ${run.destination}`);
  }
}
