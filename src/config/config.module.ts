import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import configuration from './configuration';

@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      cache: true,
      // .env files are a credential source with their own precedence rules;
      // they must not leak into process.env.
      ignoreEnvFile: true,
    }),
  ],
})
export class ConfigModule {}
