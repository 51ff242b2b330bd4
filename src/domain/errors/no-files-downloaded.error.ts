/**
 * Raised when a run finishes without a single file on disk.
 *
 * `empty-listing`: the bucket listing succeeded but had nothing eligible.
 * `targeted-fetch`: listing was denied and no known file could be fetched
 * either; `requiredPermissions` names the IAM grants that would fix it.
 */
export type NoFilesDownloadedKind = 'empty-listing' | 'targeted-fetch';

export class NoFilesDownloadedError extends Error {
  private constructor(
    readonly kind: NoFilesDownloadedKind,
    readonly bucket: string,
    readonly prefix: string,
    readonly requiredPermissions: readonly string[],
    message: string,
  ) {
    super(message);
    this.name = 'NoFilesDownloadedError';
  }

  static emptyListing(bucket: string, prefix: string): NoFilesDownloadedError {
    return new NoFilesDownloadedError(
      'empty-listing',
      bucket,
      prefix,
      [],
      `No files found in s3://${bucket}/${prefix}`,
    );
  }

  static targetedFetch(bucket: string, prefix: string): NoFilesDownloadedError {
    return new NoFilesDownloadedError(
      'targeted-fetch',
      bucket,
      prefix,
      [
        `s3:ListBucket on arn:aws:s3:::${bucket}`,
        `s3:GetObject on arn:aws:s3:::${bucket}/${prefix}*`,
      ],
      `Could not download any files from s3://${bucket}/${prefix}`,
    );
  }
}
