import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  S3Client,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
} from '@aws-sdk/client-s3';
import { Readable } from 'stream';
import { createWriteStream, promises as fs } from 'fs';
import { pipeline } from 'stream/promises';
import { AppConfig } from '../../../config/configuration';
import { AwsCredentialsVO } from '../../../domain/value-objects/aws-credentials.vo';
import { PinoLoggerService } from '../../logging/pino-logger.service';

export interface ListedObject {
  key: string;
  size: number;
}

export interface HeadResult {
  size: number;
  contentType?: string;
  etag?: string;
}

export interface DownloadResult {
  filePath: string;
  size: number;
  contentType?: string;
  etag?: string;
}

/**
 * Thin wrapper over the AWS SDK v3 S3 client.
 *
 * The client is created per run from resolved credentials (`connect`), not at
 * construction, because credentials may come from an interactive prompt.
 * SDK errors are propagated untouched; translating them is the adapter's job.
 */
@Injectable()
export class S3Service implements OnModuleDestroy {
  private client?: S3Client;
  private readonly endpoint?: string;

  constructor(
    private readonly configService: ConfigService<AppConfig>,
    private readonly logger: PinoLoggerService,
  ) {
    this.endpoint = this.configService.getOrThrow('aws', { infer: true }).endpoint;
    this.logger.setContext(S3Service.name);
  }

  connect(credentials: AwsCredentialsVO): void {
    this.disconnect();

    this.client = new S3Client({
      region: credentials.region,
      credentials: credentials.toSdkCredentials(),
      ...(this.endpoint && { endpoint: this.endpoint, forcePathStyle: true }),
    });

    this.logger.debug({ region: credentials.region, endpoint: this.endpoint }, 'S3 client created');
  }

  /**
   * Page through ListObjectsV2 under a prefix
   */
  async *listObjectPages(bucket: string, prefix: string): AsyncGenerator<ListedObject[]> {
    let continuationToken: string | undefined;
    let page = 0;

    do {
      const response = await this.requireClient().send(
        new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
        }),
      );

      page += 1;
      const objects: ListedObject[] = [];
      for (const item of response.Contents ?? []) {
        if (item.Key !== undefined) {
          objects.push({ key: item.Key, size: item.Size ?? 0 });
        }
      }

      this.logger.debug({ bucket, prefix, page, count: objects.length }, 'Listed page');
      yield objects;

      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);
  }

  async headObject(bucket: string, key: string): Promise<HeadResult> {
    const response = await this.requireClient().send(
      new HeadObjectCommand({
        Bucket: bucket,
        Key: key,
      }),
    );

    return {
      size: response.ContentLength ?? 0,
      contentType: response.ContentType,
      etag: response.ETag,
    };
  }

  async downloadToFile(bucket: string, key: string, destPath: string): Promise<DownloadResult> {
    const response = await this.requireClient().send(
      new GetObjectCommand({
        Bucket: bucket,
        Key: key,
      }),
    );

    if (!(response.Body instanceof Readable)) {
      throw new Error(`Unexpected response body for s3://${bucket}/${key}`);
    }

    const writeStream = createWriteStream(destPath);
    await pipeline(response.Body, writeStream);

    const stats = await fs.stat(destPath);

    this.logger.debug(
      { bucket, key, destPath, size: stats.size },
      'File downloaded successfully',
    );

    return {
      filePath: destPath,
      size: stats.size,
      contentType: response.ContentType,
      etag: response.ETag,
    };
  }

  disconnect(): void {
    if (this.client) {
      this.client.destroy();
      this.client = undefined;
    }
  }

  onModuleDestroy() {
    this.disconnect();
  }

  private requireClient(): S3Client {
    if (!this.client) {
      throw new Error('S3 client is not connected; call connect() first');
    }
    return this.client;
  }
}
