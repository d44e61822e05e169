import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ProfilingDrizzleLogger } from '../drizzle/profiling-drizzle-logger';
import { DebugBarController } from './debugbar.controller';
import { NestDownstreamLogger } from './nest-downstream-logger';
import {
  ProfilingConfiguration,
  enableProfiling,
} from './profiling-configuration';
import { QueryCollector } from './query-collector';
import { StatementLogEmitter } from './statement-log.emitter';

/** Instrumentation frames sit between the collector and the calling code. */
export const INSTRUMENTATION_TYPES = [
  StatementLogEmitter.name,
  ProfilingDrizzleLogger.name,
];

export function isQueryProfilingEnabled(configService: ConfigService): boolean {
  return configService.get<string>('QUERY_PROFILING') === 'true';
}

/**
 * Query profiler module.
 * Owns the application-lifetime collector, the ORM-side emitter that feeds
 * it, and the debug bar endpoints that read it.
 */
@Module({
  imports: [ConfigModule],
  controllers: [DebugBarController],
  providers: [
    {
      provide: ProfilingConfiguration,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const config = new ProfilingConfiguration();
        if (isQueryProfilingEnabled(configService)) {
          enableProfiling(config);
        }
        return config;
      },
    },
    {
      provide: QueryCollector,
      inject: [ConfigService, ProfilingConfiguration],
      useFactory: (
        configService: ConfigService,
        configuration: ProfilingConfiguration,
      ) =>
        new QueryCollector({
          logger: new NestDownstreamLogger(new Logger('SQL')),
          configuration,
          documentRoot: configService.get<string>('DOCUMENT_ROOT'),
          skippedTypes: INSTRUMENTATION_TYPES,
          logQueriesToLogger:
            configService.get<string>('LOG_QUERIES_TO_LOGGER') === 'true',
        }),
    },
    {
      provide: StatementLogEmitter,
      inject: [ProfilingConfiguration, QueryCollector],
      useFactory: (
        configuration: ProfilingConfiguration,
        collector: QueryCollector,
      ) => new StatementLogEmitter(configuration, collector),
    },
  ],
  exports: [ProfilingConfiguration, QueryCollector, StatementLogEmitter],
})
export class ProfilerModule {}
