import { Logger } from '@nestjs/common';
import type { LogLevelName } from './log-levels';

/** Generic logger that non-query messages are forwarded to. */
export interface DownstreamLogger {
  log(level: LogLevelName, message: string): void;
}

type NestLogMethod = 'error' | 'warn' | 'log' | 'debug';

const NEST_METHODS: Record<LogLevelName, NestLogMethod> = {
  emergency: 'error',
  alert: 'error',
  critical: 'error',
  error: 'error',
  warning: 'warn',
  notice: 'log',
  info: 'log',
  debug: 'debug',
};

/**
 * Writes forwarded messages to the NestJS logger. Levels above `error` have
 * no Nest counterpart and are written as errors tagged with their name.
 */
export class NestDownstreamLogger implements DownstreamLogger {
  constructor(private readonly logger: Logger = new Logger('SQL')) {}

  log(level: LogLevelName, message: string): void {
    const method = NEST_METHODS[level];
    const text =
      method === 'error' && level !== 'error'
        ? `[${level.toUpperCase()}] ${message}`
        : message;
    switch (method) {
      case 'error':
        this.logger.error(text);
        break;
      case 'warn':
        this.logger.warn(text);
        break;
      case 'log':
        this.logger.log(text);
        break;
      case 'debug':
        this.logger.debug(text);
        break;
    }
  }
}
