/**
 * Use Cases Barrel Export
 */
export { ResolveCredentialsUseCase } from './resolve-credentials.use-case';
export { DownloadModelUseCase } from './download-model.use-case';
