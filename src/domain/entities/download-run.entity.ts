import { produce } from 'immer';

/**
 * Download Run Entity
 * Accumulates what a single invocation has written to disk.
 *
 * Hybrid approach:
 * - Data stored in a plain readonly interface
 * - Operations live in the namespace as pure functions
 * - Every recording returns a new instance (Immer), totals only grow
 */

export type RetrievalTier = 'listing' | 'targeted';

export interface DownloadedFile {
  readonly remoteKey: string;
  readonly relativePath: string;
  readonly size: number;
}

export interface DownloadRunEntityData {
  readonly bucket: string;
  readonly prefix: string;
  readonly destination: string;
  readonly tier: RetrievalTier;
  readonly files: ReadonlyArray<DownloadedFile>;
  readonly totalBytes: number;
}

export interface DownloadRunEntity extends DownloadRunEntityData {
  readonly fileCount: number;

  isEmpty(): boolean;
  hasDownloaded(relativePath: string): boolean;

  recordDownload(file: DownloadedFile): DownloadRunEntity;
  switchToTargetedFetch(): DownloadRunEntity;

  toJSON(): ReturnType<typeof DownloadRunEntity.toJSON>;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace DownloadRunEntity {
  export interface StartProps {
    bucket: string;
    prefix: string;
    destination: string;
  }

  export function start(props: StartProps): DownloadRunEntity {
    if (!props.bucket || props.bucket.trim().length === 0) {
      throw new Error('Bucket is required');
    }
    if (!props.destination || props.destination.trim().length === 0) {
      throw new Error('Destination directory is required');
    }

    return attachMethods({
      bucket: props.bucket,
      prefix: props.prefix,
      destination: props.destination,
      tier: 'listing',
      files: [],
      totalBytes: 0,
    });
  }

  function attachMethods(data: DownloadRunEntityData): DownloadRunEntity {
    return {
      ...data,

      get fileCount() {
        return data.files.length;
      },

      isEmpty: () => data.files.length === 0,
      hasDownloaded: (relativePath: string) =>
        data.files.some((file) => file.relativePath === relativePath),

      recordDownload: (file: DownloadedFile) => recordDownload(data, file),
      switchToTargetedFetch: () => switchToTargetedFetch(data),

      toJSON: () => toJSON(data),
    };
  }

  export function recordDownload(
    run: DownloadRunEntityData,
    file: DownloadedFile,
  ): DownloadRunEntity {
    if (file.size < 0) {
      throw new Error(`File size cannot be negative: ${file.relativePath}`);
    }

    const updated = produce(run, (draft) => {
      draft.files.push({ ...file });
      draft.totalBytes += file.size;
    });
    return attachMethods(updated);
  }

  export function switchToTargetedFetch(run: DownloadRunEntityData): DownloadRunEntity {
    const updated = produce(run, (draft) => {
      draft.tier = 'targeted';
    });
    return attachMethods(updated);
  }

  export function toJSON(run: DownloadRunEntityData) {
    return {
      bucket: run.bucket,
      prefix: run.prefix,
      destination: run.destination,
      tier: run.tier,
      fileCount: run.files.length,
      totalBytes: run.totalBytes,
      files: run.files.map((file) => ({ ...file })),
    };
  }
}
