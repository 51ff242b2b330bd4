import { Module } from '@nestjs/common';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';

// Use Cases
import { ResolveCredentialsUseCase, DownloadModelUseCase } from './use-cases';

/**
 * Application Module
 * Contains all use cases
 *
 * Use cases depend on output port tokens only; the InfrastructureModule
 * binds those tokens to adapters.
 */
@Module({
  imports: [InfrastructureModule],
  providers: [ResolveCredentialsUseCase, DownloadModelUseCase],
  exports: [ResolveCredentialsUseCase, DownloadModelUseCase],
})
export class ApplicationModule {}
