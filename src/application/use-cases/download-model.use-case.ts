import { Inject, Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import { dirname, resolve } from 'path';
import {
  DownloadModelCommand,
  DownloadModelPort,
  DownloadModelResult,
} from '../ports/input/download-model.port';
import {
  OBJECT_STORE_PORT,
  ObjectListingEntry,
  ObjectStorePort,
} from '../ports/output/object-store.port';
import {
  DOWNLOAD_REPORTER_PORT,
  DownloadReporterPort,
} from '../ports/output/download-reporter.port';
import { DownloadRunEntity } from '../../domain/entities/download-run.entity';
import { ManifestItemVO } from '../../domain/value-objects/manifest-item.vo';
import { WeightIndexVO } from '../../domain/value-objects/weight-index.vo';
import {
  AUXILIARY_MODEL_FILES,
  MODEL_INDEX_FILE,
  isDownloadableKey,
} from '../../domain/model-layout';
import { NoFilesDownloadedError } from '../../domain/errors/no-files-downloaded.error';
import { StoreError, isAccessDenied } from '../../domain/errors/store.error';
import { UnsafeObjectKeyError } from '../../domain/errors/unsafe-object-key.error';

interface IndexFetchResult {
  run: DownloadRunEntity;
  referencedFiles: readonly string[];
}

/**
 * Download Model Use Case
 *
 * Primary path lists the prefix and downloads every eligible object.
 * When the listing itself is denied, falls back to fetching the weight index
 * and a fixed set of well-known files by name.
 */
@Injectable()
export class DownloadModelUseCase implements DownloadModelPort {
  private readonly logger = new Logger(DownloadModelUseCase.name);

  constructor(
    @Inject(OBJECT_STORE_PORT)
    private readonly objectStore: ObjectStorePort,
    @Inject(DOWNLOAD_REPORTER_PORT)
    private readonly reporter: DownloadReporterPort,
  ) {}

  async execute(command: DownloadModelCommand): Promise<DownloadModelResult> {
    const { bucket, prefix, destination, credentials } = command;

    this.reporter.runStarted({ bucket, prefix, region: credentials.region, destination });
    await fs.mkdir(destination, { recursive: true });

    this.objectStore.connect(credentials);
    try {
      const run = await this.fetchListedObjects(
        DownloadRunEntity.start({ bucket, prefix, destination }),
      );

      if (run.isEmpty()) {
        throw run.tier === 'targeted'
          ? NoFilesDownloadedError.targetedFetch(bucket, prefix)
          : NoFilesDownloadedError.emptyListing(bucket, prefix);
      }

      this.logger.debug(
        `Run finished via ${run.tier}: ${run.fileCount} files, ${run.totalBytes} bytes`,
      );
      this.reporter.runCompleted(run);

      return { run };
    } finally {
      this.objectStore.disconnect();
    }
  }

  /**
   * Enumerate-then-fetch. Only a denied listing call hands over to the
   * targeted fetch; download failures here abort the run.
   */
  private async fetchListedObjects(initial: DownloadRunEntity): Promise<DownloadRunEntity> {
    const { bucket, prefix, destination } = initial;
    let run = initial;

    this.reporter.listingStarted();
    const pages = this.objectStore.listObjects(bucket, prefix)[Symbol.asyncIterator]();

    while (true) {
      let page: IteratorResult<ObjectListingEntry[]>;
      try {
        page = await pages.next();
      } catch (error) {
        if (isAccessDenied(error)) {
          this.logger.debug(`Listing s3://${bucket}/${prefix} denied, switching to targeted fetch`);
          return this.fetchKnownObjects(run.switchToTargetedFetch());
        }
        throw error;
      }

      if (page.done) {
        return run;
      }

      for (const entry of page.value) {
        if (!isDownloadableKey(entry.key)) {
          this.logger.debug(`Skipping ${entry.key}`);
          continue;
        }

        let item: ManifestItemVO;
        try {
          item = ManifestItemVO.fromObjectKey(entry.key, prefix, destination, entry.size);
        } catch (error) {
          if (error instanceof UnsafeObjectKeyError) {
            this.reporter.objectSkipped(entry.key, error.message);
            continue;
          }
          throw error;
        }

        run = await this.fetchObject(run, item);
      }
    }
  }

  /**
   * Targeted fetch: index file, then well-known files, then every shard the
   * index references. Individual failures never abort the batch. Files the
   * listing already delivered are not fetched again.
   */
  private async fetchKnownObjects(initial: DownloadRunEntity): Promise<DownloadRunEntity> {
    const { bucket, prefix, destination } = initial;
    this.reporter.listingDenied();

    const indexResult = await this.fetchIndex(initial);
    let run = indexResult.run;

    const candidates = [
      ...new Set([...AUXILIARY_MODEL_FILES, ...indexResult.referencedFiles]),
    ].filter((fileName) => fileName !== MODEL_INDEX_FILE);

    for (const fileName of candidates) {
      const key = `${prefix}${fileName}`;

      if (run.hasDownloaded(fileName)) {
        this.logger.debug(`Already downloaded ${key}`);
        continue;
      }

      let size: number;
      try {
        size = (await this.objectStore.headObject(bucket, key)).contentLength;
      } catch (error) {
        this.logger.debug(
          `Metadata request failed for ${key}: ${error instanceof Error ? error.message : String(error)}`,
        );
        continue;
      }

      try {
        const item = ManifestItemVO.fromFileName(fileName, prefix, destination, size);
        run = await this.fetchObject(run, item);
      } catch (error) {
        this.logger.debug(
          `Download failed for ${key}: ${error instanceof Error ? error.message : String(error)}`,
        );
        this.reporter.fileFailed(fileName, error);
      }
    }

    return run;
  }

  private async fetchIndex(run: DownloadRunEntity): Promise<IndexFetchResult> {
    const { bucket, prefix, destination } = run;
    const key = `${prefix}${MODEL_INDEX_FILE}`;
    let current = run;

    try {
      if (!current.hasDownloaded(MODEL_INDEX_FILE)) {
        const head = await this.objectStore.headObject(bucket, key);
        const item = ManifestItemVO.fromFileName(
          MODEL_INDEX_FILE,
          prefix,
          destination,
          head.contentLength,
        );
        current = await this.fetchObject(current, item, { isIndex: true });
      }

      const index = WeightIndexVO.parse(
        await fs.readFile(resolve(destination, MODEL_INDEX_FILE), 'utf8'),
      );
      this.reporter.indexParsed(index.size);

      return { run: current, referencedFiles: index.fileNames };
    } catch (error) {
      if (error instanceof StoreError) {
        this.reporter.indexUnavailable(
          error.isAccessDenied() ? 'access-denied' : 'not-found',
          error.message,
        );
      } else {
        this.reporter.indexUnavailable(
          'unreadable',
          error instanceof Error ? error.message : String(error),
        );
      }
      return { run: current, referencedFiles: [] };
    }
  }

  private async fetchObject(
    run: DownloadRunEntity,
    item: ManifestItemVO,
    options?: { isIndex?: boolean },
  ): Promise<DownloadRunEntity> {
    await fs.mkdir(dirname(item.localPath), { recursive: true });
    await this.objectStore.downloadFile(run.bucket, item.remoteKey, item.localPath);

    this.reporter.fileDownloaded(item, options);

    return run.recordDownload({
      remoteKey: item.remoteKey,
      relativePath: item.relativePath,
      size: item.size,
    });
  }
}
