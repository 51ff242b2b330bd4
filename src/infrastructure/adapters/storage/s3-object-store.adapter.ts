import { Injectable, Logger } from '@nestjs/common';
import { S3ServiceException } from '@aws-sdk/client-s3';
import {
  ObjectHead,
  ObjectListingEntry,
  ObjectStorePort,
} from '../../../application/ports/output/object-store.port';
import { AwsCredentialsVO } from '../../../domain/value-objects/aws-credentials.vo';
import { StoreError } from '../../../domain/errors/store.error';
import { CredentialsError } from '../../../domain/errors/credentials.error';
import { S3Service } from '../../../shared/aws/s3/s3.service';

const ACCESS_DENIED_CODES = new Set(['AccessDenied', 'Forbidden', 'AllAccessDisabled']);
const NOT_FOUND_CODES = new Set(['NotFound', 'NoSuchKey', 'NoSuchBucket']);
const INVALID_CREDENTIAL_CODES = new Set([
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'ExpiredToken',
  'InvalidToken',
]);

/**
 * Translate an SDK failure into the store's tagged error model.
 * Non-SDK errors (network, filesystem) pass through unchanged.
 */
export function toStoreError(error: unknown, key: string): unknown {
  if (error instanceof S3ServiceException) {
    const status = error.$metadata?.httpStatusCode;

    if (INVALID_CREDENTIAL_CODES.has(error.name)) {
      return new CredentialsError(`AWS rejected the credentials: ${error.name}`, {
        cause: error,
      });
    }
    if (ACCESS_DENIED_CODES.has(error.name) || status === 403) {
      return StoreError.accessDenied(key, `Access denied: ${key}`, error);
    }
    if (NOT_FOUND_CODES.has(error.name) || status === 404) {
      return StoreError.notFound(key, `Not found: ${key} (${error.name})`, error);
    }
    return StoreError.other(key, error.name, `${error.name}: ${error.message}`, error);
  }

  if (error instanceof Error && error.name === 'CredentialsProviderError') {
    return new CredentialsError(error.message, { cause: error });
  }

  return error;
}

/**
 * S3 Object Store Adapter
 * Implements ObjectStorePort using AWS S3
 */
@Injectable()
export class S3ObjectStoreAdapter implements ObjectStorePort {
  private readonly logger = new Logger(S3ObjectStoreAdapter.name);

  constructor(private readonly s3Service: S3Service) {}

  connect(credentials: AwsCredentialsVO): void {
    this.s3Service.connect(credentials);
  }

  async *listObjects(bucket: string, prefix: string): AsyncGenerator<ObjectListingEntry[]> {
    this.logger.debug(`Listing s3://${bucket}/${prefix}`);

    try {
      for await (const page of this.s3Service.listObjectPages(bucket, prefix)) {
        yield page;
      }
    } catch (error) {
      throw toStoreError(error, `${bucket}/${prefix}`);
    }
  }

  async headObject(bucket: string, key: string): Promise<ObjectHead> {
    try {
      const result = await this.s3Service.headObject(bucket, key);
      return {
        contentLength: result.size,
        contentType: result.contentType,
        etag: result.etag,
      };
    } catch (error) {
      throw toStoreError(error, `${bucket}/${key}`);
    }
  }

  async downloadFile(bucket: string, key: string, destinationPath: string): Promise<void> {
    this.logger.debug(`Downloading s3://${bucket}/${key} to ${destinationPath}`);

    try {
      await this.s3Service.downloadToFile(bucket, key, destinationPath);
    } catch (error) {
      throw toStoreError(error, `${bucket}/${key}`);
    }
  }

  disconnect(): void {
    this.s3Service.disconnect();
  }
}
