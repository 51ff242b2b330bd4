/**
 * AWS Credentials Value Object
 * A complete access key / secret / region triple, held only in memory.
 */
export interface AwsCredentialsProps {
  accessKeyId: string;
  secretAccessKey: string;
  region: string;
}

export class AwsCredentialsVO {
  private readonly _accessKeyId: string;
  private readonly _secretAccessKey: string;
  private readonly _region: string;

  private constructor(props: AwsCredentialsProps) {
    this._accessKeyId = props.accessKeyId;
    this._secretAccessKey = props.secretAccessKey;
    this._region = props.region;
  }

  static create(props: AwsCredentialsProps): AwsCredentialsVO {
    const normalized = {
      accessKeyId: props.accessKeyId.trim(),
      secretAccessKey: props.secretAccessKey.trim(),
      region: props.region.trim(),
    };
    AwsCredentialsVO.validate(normalized);
    return new AwsCredentialsVO(normalized);
  }

  private static validate(props: AwsCredentialsProps): void {
    if (props.accessKeyId.length === 0) {
      throw new Error('Access key ID cannot be empty');
    }
    if (props.secretAccessKey.length === 0) {
      throw new Error('Secret access key cannot be empty');
    }
    if (props.region.length === 0) {
      throw new Error('Region cannot be empty');
    }
  }

  get accessKeyId(): string {
    return this._accessKeyId;
  }

  get secretAccessKey(): string {
    return this._secretAccessKey;
  }

  get region(): string {
    return this._region;
  }

  /**
   * Shape expected by AWS SDK v3 clients
   */
  toSdkCredentials(): { accessKeyId: string; secretAccessKey: string } {
    return {
      accessKeyId: this._accessKeyId,
      secretAccessKey: this._secretAccessKey,
    };
  }

  toJSON() {
    return {
      accessKeyId: AwsCredentialsVO.mask(this._accessKeyId),
      secretAccessKey: '********',
      region: this._region,
    };
  }

  private static mask(value: string): string {
    return value.length <= 4 ? '****' : `${'*'.repeat(value.length - 4)}${value.slice(-4)}`;
  }
}
