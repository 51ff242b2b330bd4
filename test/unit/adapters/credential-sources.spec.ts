import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import prompts from 'prompts';
import { EnvironmentCredentialSource } from '../../../src/infrastructure/adapters/credentials/environment-credential.source';
import { EnvFileCredentialSource } from '../../../src/infrastructure/adapters/credentials/env-file-credential.source';
import { PromptsCredentialPrompt } from '../../../src/infrastructure/adapters/credentials/prompts-credential.prompt';
import { createTempDir } from '../helpers/mock-factories';

describe('EnvironmentCredentialSource', () => {
  it('should read the short variable names', async () => {
    const source = new EnvironmentCredentialSource({
      AWS_KEY: 'env-key',
      AWS_SECRET: 'env-secret',
      AWS_REGION: 'eu-west-1',
    });

    await expect(source.read()).resolves.toEqual({
      accessKeyId: 'env-key',
      secretAccessKey: 'env-secret',
      region: 'eu-west-1',
    });
  });

  it('should fall back to the standard AWS variable names', async () => {
    const source = new EnvironmentCredentialSource({
      AWS_ACCESS_KEY_ID: 'std-key',
      AWS_SECRET_ACCESS_KEY: 'std-secret',
      AWS_DEFAULT_REGION: 'eu-north-1',
    });

    await expect(source.read()).resolves.toEqual({
      accessKeyId: 'std-key',
      secretAccessKey: 'std-secret',
      region: 'eu-north-1',
    });
  });

  it('should skip blank values', async () => {
    const source = new EnvironmentCredentialSource({
      AWS_KEY: '  ',
      AWS_ACCESS_KEY_ID: 'std-key',
    });

    const fields = await source.read();

    expect(fields.accessKeyId).toBe('std-key');
    expect(fields.secretAccessKey).toBeUndefined();
    expect(fields.region).toBe('us-east-1');
  });

  it('should default the region to us-east-1', async () => {
    const source = new EnvironmentCredentialSource({ AWS_REGION: ' ', AWS_DEFAULT_REGION: '' });

    await expect(source.read()).resolves.toEqual({
      accessKeyId: undefined,
      secretAccessKey: undefined,
      region: 'us-east-1',
    });
  });
});

describe('EnvFileCredentialSource', () => {
  let root: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    const tempDir = await createTempDir();
    root = tempDir.path;
    cleanup = tempDir.cleanup;
  });

  afterEach(async () => {
    await cleanup();
  });

  it('should read AWS_KEY, AWS_SECRET and AWS_REGION from the file', async () => {
    const path = join(root, '.env');
    await writeFile(
      path,
      ['# credentials', 'AWS_KEY=file-key', 'AWS_SECRET="file-secret"', 'AWS_REGION=eu-central-1', ''].join('\n'),
    );

    await expect(new EnvFileCredentialSource([path]).read()).resolves.toEqual({
      accessKeyId: 'file-key',
      secretAccessKey: 'file-secret',
      region: 'eu-central-1',
    });
  });

  it('should only read the first existing candidate', async () => {
    const first = join(root, 'first.env');
    const second = join(root, 'second.env');
    await writeFile(first, 'AWS_KEY=first-key\n');
    await writeFile(second, 'AWS_KEY=second-key\nAWS_SECRET=second-secret\n');

    const fields = await new EnvFileCredentialSource([join(root, 'missing.env'), first, second]).read();

    expect(fields.accessKeyId).toBe('first-key');
    expect(fields.secretAccessKey).toBeUndefined();
  });

  it('should skip a candidate that is a directory', async () => {
    const directory = join(root, 'dir.env');
    const file = join(root, '.env');
    await mkdir(directory);
    await writeFile(file, 'AWS_SECRET=file-secret\n');

    const fields = await new EnvFileCredentialSource([directory, file]).read();

    expect(fields.secretAccessKey).toBe('file-secret');
  });

  it('should return nothing when no candidate exists', async () => {
    await expect(new EnvFileCredentialSource([join(root, 'missing.env')]).read()).resolves.toEqual({});
  });
});

describe('PromptsCredentialPrompt', () => {
  const prompt = new PromptsCredentialPrompt();

  it('should return trimmed answers for the requested fields', async () => {
    prompts.inject(['  typed-key  ', 'test-secret']);

    await expect(prompt.prompt(['accessKeyId', 'secretAccessKey'])).resolves.toEqual({
      accessKeyId: 'typed-key',
      secretAccessKey: 'test-secret',
    });
  });

  it('should leave out empty answers', async () => {
    prompts.inject(['']);

    await expect(prompt.prompt(['secretAccessKey'])).resolves.toEqual({});
  });

  it('should not ask anything when nothing is missing', async () => {
    await expect(prompt.prompt([])).resolves.toEqual({});
  });

  it('should fail when the operator cancels', async () => {
    prompts.inject([new Error('cancelled')]);

    await expect(prompt.prompt(['accessKeyId'])).rejects.toThrow('Credential prompt was cancelled');
  });
});
