import { AwsCredentialsVO } from '../../../domain/value-objects/aws-credentials.vo';
import { DownloadRunEntity } from '../../../domain/entities/download-run.entity';

/**
 * Download Model Command
 */
export interface DownloadModelCommand {
  credentials: AwsCredentialsVO;
  bucket: string;
  prefix: string;
  destination: string;
}

/**
 * Download Model Result
 */
export interface DownloadModelResult {
  run: DownloadRunEntity;
}

/**
 * Download Model Port (Driving Port / Use Case Interface)
 * Materialises every model artifact under a bucket/prefix in a local directory
 */
export interface DownloadModelPort {
  execute(command: DownloadModelCommand): Promise<DownloadModelResult>;
}
