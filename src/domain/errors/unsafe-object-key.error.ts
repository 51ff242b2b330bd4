/**
 * An object key (or index entry) whose local path would land outside the
 * destination directory.
 */
export class UnsafeObjectKeyError extends Error {
  constructor(
    readonly key: string,
    readonly relativePath: string,
  ) {
    super(`Refusing to write "${key}" outside the destination directory`);
    this.name = 'UnsafeObjectKeyError';
  }
}
