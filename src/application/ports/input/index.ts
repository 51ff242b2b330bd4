/**
 * Input Ports (Driving Ports) Barrel Export
 */
export {
  type ResolveCredentialsPort,
  type ResolveCredentialsCommand,
  type ResolveCredentialsResult,
  type CredentialOrigin,
} from './resolve-credentials.port';
export {
  type DownloadModelPort,
  type DownloadModelCommand,
  type DownloadModelResult,
} from './download-model.port';
