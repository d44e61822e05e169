import { Module, Global, Inject } from '@nestjs/common';
import type { OnModuleDestroy } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { ProfilerModule, isQueryProfilingEnabled } from '../profiler/profiler.module';
import { StatementLogEmitter } from '../profiler/statement-log.emitter';
import { ProfilingDrizzleLogger } from './profiling-drizzle-logger';

export const DrizzleAsyncProvider = 'drizzleProvider';
export const POSTGRES_CLIENT = 'POSTGRES_CLIENT';

@Global()
@Module({
  imports: [ConfigModule, ProfilerModule],
  providers: [
    {
      provide: POSTGRES_CLIENT,
      inject: [ConfigService, StatementLogEmitter],
      useFactory: (configService: ConfigService, emitter: StatementLogEmitter) => {
        const connectionString = configService.get<string>('DATABASE_URL');
        if (!connectionString) {
          throw new Error('DATABASE_URL is undefined');
        }
        const client = postgres(connectionString, {
          max: configService.get<number>('DB_POOL_MAX', 10),
          idle_timeout: configService.get<number>('DB_IDLE_TIMEOUT', 30),
        });
        emitter.emit('DebugPDO::open', 'Opening connection');
        return client;
      },
    },
    {
      provide: DrizzleAsyncProvider,
      inject: [ConfigService, POSTGRES_CLIENT, StatementLogEmitter],
      useFactory: (
        configService: ConfigService,
        client: postgres.Sql,
        emitter: StatementLogEmitter,
      ) =>
        drizzle(client, {
          logger: isQueryProfilingEnabled(configService)
            ? new ProfilingDrizzleLogger(emitter)
            : undefined,
        }),
    },
  ],
  exports: [DrizzleAsyncProvider],
})
export class DrizzleModule implements OnModuleDestroy {
  constructor(
    @Inject(POSTGRES_CLIENT) private readonly client: postgres.Sql,
    private readonly emitter: StatementLogEmitter,
  ) {}

  async onModuleDestroy(): Promise<void> {
    await this.client.end({ timeout: 5 });
    this.emitter.emit('DebugPDO::close', 'Closing connection');
  }
}
