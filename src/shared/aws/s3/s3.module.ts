import { Module } from '@nestjs/common';
import { ConfigModule } from '../../../config/config.module';
import { LoggingModule } from '../../logging/logging.module';
import { S3Service } from './s3.service';

@Module({
  imports: [ConfigModule, LoggingModule],
  providers: [S3Service],
  exports: [S3Service],
})
export class S3Module {}
