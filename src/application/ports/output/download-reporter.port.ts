import { DownloadRunEntity } from '../../../domain/entities/download-run.entity';
import { ManifestItemVO } from '../../../domain/value-objects/manifest-item.vo';

export const DOWNLOAD_REPORTER_PORT = 'DownloadReporterPort';

export interface RunStartedInfo {
  bucket: string;
  prefix: string;
  region: string;
  destination: string;
}

export type IndexUnavailableReason = 'access-denied' | 'not-found' | 'unreadable';

/**
 * Download Reporter Port (Driven Port)
 * User-facing progress of a download run.
 */
export interface DownloadReporterPort {
  runStarted(info: RunStartedInfo): void;

  listingStarted(): void;

  /**
   * Called once a file is fully on disk
   */
  fileDownloaded(item: ManifestItemVO, options?: { isIndex?: boolean }): void;

  /**
   * A listed key that will not be written (unsafe local path)
   */
  objectSkipped(key: string, reason: string): void;

  /**
   * Listing was denied; the targeted fetch is about to start
   */
  listingDenied(): void;

  indexParsed(fileCount: number): void;

  indexUnavailable(reason: IndexUnavailableReason, detail?: string): void;

  /**
   * A targeted download failed; the run continues with the next file
   */
  fileFailed(fileName: string, error: unknown): void;

  runCompleted(run: DownloadRunEntity): void;
}
