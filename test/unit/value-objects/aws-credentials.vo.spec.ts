import { describe, it, expect } from 'vitest';
import { AwsCredentialsVO } from '../../../src/domain/value-objects/aws-credentials.vo';

describe('AwsCredentialsVO', () => {
  const props = {
    accessKeyId: 'test-access-key',
    secretAccessKey: 'test-secret',
    region: 'eu-west-1',
  };

  it('should trim every field', () => {
    const credentials = AwsCredentialsVO.create({
      accessKeyId: ' test-access-key ',
      secretAccessKey: '\ttest-secret\n',
      region: ' eu-west-1',
    });

    expect(credentials.toSdkCredentials()).toEqual({
      accessKeyId: 'test-access-key',
      secretAccessKey: 'test-secret',
    });
    expect(credentials.region).toBe('eu-west-1');
  });

  it.each([
    ['accessKeyId', 'Access key ID cannot be empty'],
    ['secretAccessKey', 'Secret access key cannot be empty'],
    ['region', 'Region cannot be empty'],
  ] as const)('should reject an empty %s', (field, message) => {
    expect(() => AwsCredentialsVO.create({ ...props, [field]: '  ' })).toThrow(message);
  });

  it('should never serialize the secret', () => {
    expect(JSON.stringify(AwsCredentialsVO.create(props))).toBe(
      '{"accessKeyId":"***********-key","secretAccessKey":"********","region":"eu-west-1"}',
    );
  });
});
