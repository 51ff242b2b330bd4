import { Injectable, LoggerService } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pino, { Logger } from 'pino';
import pretty from 'pino-pretty';
import { AppConfig } from '../../config/configuration';

/**
 * Pino-backed Nest logger.
 *
 * Writes to stderr so stdout carries only the download report.
 */
@Injectable()
export class PinoLoggerService implements LoggerService {
  private logger: Logger;
  private context?: string;

  constructor(private readonly configService: ConfigService<AppConfig>) {
    const logLevel = this.configService.get('logLevel', { infer: true }) || 'warn';
    const nodeEnv = this.configService.get('nodeEnv', { infer: true });

    const options: pino.LoggerOptions = {
      level: logLevel,
      formatters: {
        level: (label) => ({ level: label }),
      },
      base: {
        service: 'model-fetch',
        env: nodeEnv,
      },
    };

    this.logger =
      nodeEnv === 'development'
        ? pino(
            options,
            pretty({
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname,service,env',
              destination: 2,
              sync: true,
            }),
          )
        : pino(options, pino.destination({ dest: 2, sync: true }));
  }

  setContext(context: string): void {
    this.context = context;
  }

  private formatMessage(
    message: string,
    context?: string,
  ): { msg: string; context?: string } {
    return {
      msg: message,
      context: context || this.context,
    };
  }

  log(message: string, context?: string): void {
    this.logger.info(this.formatMessage(message, context));
  }

  error(
    message: string | Record<string, unknown>,
    trace?: string,
    context?: string,
  ): void {
    if (typeof message === 'object') {
      this.logger.error({ ...message, context: this.context }, trace || '');
    } else {
      this.logger.error({ trace, context: context || this.context }, message);
    }
  }

  warn(message: string | Record<string, unknown>, context?: string): void {
    if (typeof message === 'object') {
      this.logger.warn({ ...message, context: this.context }, context || '');
    } else {
      this.logger.warn(this.formatMessage(message, context));
    }
  }

  debug(message: string | Record<string, unknown>, context?: string): void {
    if (typeof message === 'object') {
      this.logger.debug({ ...message, context: this.context }, context || '');
    } else {
      this.logger.debug(this.formatMessage(message, context));
    }
  }

  verbose(message: string, context?: string): void {
    this.logger.trace(this.formatMessage(message, context));
  }
}
