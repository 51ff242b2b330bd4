import { describe, it, expect } from 'vitest';
import { DownloadRunEntity } from '../../../src/domain/entities/download-run.entity';

/**
 * Immutability Tests for DownloadRunEntity
 * Every recording returns a new instance and leaves the previous one untouched
 */
describe('DownloadRunEntity - Immutability Validation', () => {
  const createTestRun = () =>
    DownloadRunEntity.start({
      bucket: 'test-models',
      prefix: 'Test-Model-v1/',
      destination: '/tmp/model',
    });

  const file = (relativePath: string, size: number) => ({
    remoteKey: `Test-Model-v1/${relativePath}`,
    relativePath,
    size,
  });

  describe('start', () => {
    it('should begin empty on the listing tier', () => {
      const run = createTestRun();

      expect(run.tier).toBe('listing');
      expect(run.fileCount).toBe(0);
      expect(run.totalBytes).toBe(0);
      expect(run.isEmpty()).toBe(true);
    });

    it('should require a bucket and a destination', () => {
      expect(() =>
        DownloadRunEntity.start({ bucket: ' ', prefix: 'p/', destination: '/tmp/model' }),
      ).toThrow('Bucket is required');
      expect(() =>
        DownloadRunEntity.start({ bucket: 'test-models', prefix: 'p/', destination: '' }),
      ).toThrow('Destination directory is required');
    });
  });

  describe('recordDownload', () => {
    it('should return a new instance and leave the original untouched', () => {
      const run = createTestRun();

      const updated = run.recordDownload(file('config.json', 512));

      expect(updated).not.toBe(run);
      expect(run.fileCount).toBe(0);
      expect(run.totalBytes).toBe(0);
      expect(updated.fileCount).toBe(1);
      expect(updated.totalBytes).toBe(512);
    });

    it('should accumulate counts and bytes across recordings', () => {
      const updated = createTestRun()
        .recordDownload(file('config.json', 512))
        .recordDownload(file('model-00001-of-00002.safetensors', 4096))
        .recordDownload(file('empty.txt', 0));

      expect(updated.fileCount).toBe(3);
      expect(updated.totalBytes).toBe(4608);
      expect(updated.hasDownloaded('empty.txt')).toBe(true);
      expect(updated.hasDownloaded('tokenizer.json')).toBe(false);
    });

    it('should freeze the recorded file list', () => {
      const updated = createTestRun().recordDownload(file('config.json', 512));

      expect(Object.isFrozen(updated.files)).toBe(true);
    });

    it('should copy the recorded file rather than keep a reference', () => {
      const recorded = file('config.json', 512);
      const updated = createTestRun().recordDownload(recorded);

      expect(updated.files[0]).toEqual(recorded);
      expect(updated.files[0]).not.toBe(recorded);
    });

    it('should reject a negative size', () => {
      expect(() => createTestRun().recordDownload(file('config.json', -1))).toThrow(
        'File size cannot be negative: config.json',
      );
    });
  });

  describe('switchToTargetedFetch', () => {
    it('should keep files recorded so far', () => {
      const run = createTestRun().recordDownload(file('a.bin', 3));

      const switched = run.switchToTargetedFetch();

      expect(switched).not.toBe(run);
      expect(run.tier).toBe('listing');
      expect(switched.tier).toBe('targeted');
      expect(switched.fileCount).toBe(1);
      expect(switched.totalBytes).toBe(3);
    });
  });

  it('should serialize to plain data', () => {
    const run = createTestRun().recordDownload(file('config.json', 512));

    expect(run.toJSON()).toEqual({
      bucket: 'test-models',
      prefix: 'Test-Model-v1/',
      destination: '/tmp/model',
      tier: 'listing',
      fileCount: 1,
      totalBytes: 512,
      files: [{ remoteKey: 'Test-Model-v1/config.json', relativePath: 'config.json', size: 512 }],
    });
  });
});
