/**
 * Domain Layer Barrel Export
 *
 * The domain layer has no framework dependencies.
 */

// Entities
export {
  DownloadRunEntity,
  type DownloadRunEntityData,
  type DownloadedFile,
  type RetrievalTier,
} from './entities/download-run.entity';

// Value Objects
export { AwsCredentialsVO, type AwsCredentialsProps } from './value-objects/aws-credentials.vo';
export { ManifestItemVO, type ManifestItemProps } from './value-objects/manifest-item.vo';
export { WeightIndexVO } from './value-objects/weight-index.vo';

// Model layout
export { MODEL_INDEX_FILE, AUXILIARY_MODEL_FILES, isDownloadableKey } from './model-layout';

// Errors
export * from './errors';
