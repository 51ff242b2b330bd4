import { isAbsolute, relative, resolve, sep } from 'path';
import { UnsafeObjectKeyError } from '../errors/unsafe-object-key.error';

/**
 * Manifest Item Value Object
 * One remote object mapped onto a path inside the destination directory.
 */
export interface ManifestItemProps {
  remoteKey: string;
  relativePath: string;
  localPath: string;
  size: number;
}

export class ManifestItemVO {
  private constructor(private readonly props: ManifestItemProps) {}

  /**
   * Map a listed key onto the destination by stripping the prefix.
   *
   * @throws UnsafeObjectKeyError when the resulting path is empty, absolute
   * or escapes `destination`
   */
  static fromObjectKey(
    remoteKey: string,
    prefix: string,
    destination: string,
    size: number,
  ): ManifestItemVO {
    const relativePath = remoteKey.startsWith(prefix)
      ? remoteKey.slice(prefix.length)
      : remoteKey;
    return ManifestItemVO.create(remoteKey, relativePath, destination, size);
  }

  /**
   * Map a bare file name (auxiliary file or index entry) onto the destination.
   */
  static fromFileName(
    fileName: string,
    prefix: string,
    destination: string,
    size: number,
  ): ManifestItemVO {
    return ManifestItemVO.create(`${prefix}${fileName}`, fileName, destination, size);
  }

  private static create(
    remoteKey: string,
    relativePath: string,
    destination: string,
    size: number,
  ): ManifestItemVO {
    if (!Number.isFinite(size) || size < 0) {
      throw new Error(`Invalid object size for ${remoteKey}: ${size}`);
    }

    const root = resolve(destination);
    const localPath = resolve(root, relativePath);
    const fromRoot = relative(root, localPath);

    if (
      relativePath.length === 0 ||
      isAbsolute(relativePath) ||
      fromRoot.length === 0 ||
      fromRoot.split(sep)[0] === '..' ||
      isAbsolute(fromRoot)
    ) {
      throw new UnsafeObjectKeyError(remoteKey, relativePath);
    }

    return new ManifestItemVO({ remoteKey, relativePath, localPath, size });
  }

  get remoteKey(): string {
    return this.props.remoteKey;
  }

  get relativePath(): string {
    return this.props.relativePath;
  }

  get localPath(): string {
    return this.props.localPath;
  }

  get size(): number {
    return this.props.size;
  }

  toJSON(): ManifestItemProps {
    return { ...this.props };
  }
}
