export { CredentialsError } from './credentials.error';
export { StoreError, isAccessDenied, type StoreErrorKind } from './store.error';
export { NoFilesDownloadedError, type NoFilesDownloadedKind } from './no-files-downloaded.error';
export { UnsafeObjectKeyError } from './unsafe-object-key.error';
