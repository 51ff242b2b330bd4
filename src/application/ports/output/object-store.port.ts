import { AwsCredentialsVO } from '../../../domain/value-objects/aws-credentials.vo';

export const OBJECT_STORE_PORT = 'ObjectStorePort';

/**
 * One entry of a bucket listing page
 */
export interface ObjectListingEntry {
  key: string;
  size: number;
}

/**
 * Metadata returned by a HEAD request (no body transferred)
 */
export interface ObjectHead {
  contentLength: number;
  contentType?: string;
  etag?: string;
}

/**
 * Object Store Port (Driven Port)
 * Read-only access to an S3-compatible bucket.
 *
 * Every operation rejects with a `StoreError` (tagged NotFound / AccessDenied /
 * Other) for service failures, or a `CredentialsError` when the store rejects
 * the credentials themselves.
 */
export interface ObjectStorePort {
  /**
   * Open a client for the given credentials. Must be called before any other
   * operation.
   */
  connect(credentials: AwsCredentialsVO): void;

  /**
   * Enumerate objects under a prefix, one page at a time
   */
  listObjects(bucket: string, prefix: string): AsyncIterable<ObjectListingEntry[]>;

  /**
   * Fetch an object's metadata without its body
   */
  headObject(bucket: string, key: string): Promise<ObjectHead>;

  /**
   * Download an object to a local path. The parent directory must exist.
   */
  downloadFile(bucket: string, key: string, destinationPath: string): Promise<void>;

  /**
   * Release the client opened by `connect`
   */
  disconnect(): void;
}
