/**
 * Output Ports (Driven Ports) Barrel Export
 * These are interfaces that the infrastructure layer must implement
 */
export {
  OBJECT_STORE_PORT,
  type ObjectStorePort,
  type ObjectListingEntry,
  type ObjectHead,
} from './object-store.port';
export {
  CREDENTIAL_SOURCES,
  type CredentialSourcePort,
  type CredentialField,
  type CredentialFields,
} from './credential-source.port';
export {
  CREDENTIAL_PROMPT_PORT,
  type CredentialPromptPort,
  type PromptedField,
} from './credential-prompt.port';
export {
  DOWNLOAD_REPORTER_PORT,
  type DownloadReporterPort,
  type RunStartedInfo,
  type IndexUnavailableReason,
} from './download-reporter.port';
