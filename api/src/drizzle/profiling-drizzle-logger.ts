import type { Logger as DrizzleLogger } from 'drizzle-orm';
import {
  QUERY_EXECUTION_MARKER,
  type InstrumentedMethod,
} from '../profiler/profiling-configuration';
import type { StatementLogEmitter } from '../profiler/statement-log.emitter';

const TRANSACTION_METHODS: ReadonlyArray<[RegExp, InstrumentedMethod]> = [
  [/^\s*(begin|start\s+transaction)\b/i, 'DebugPDO::beginTransaction'],
  [/^\s*commit\b/i, 'DebugPDO::commit'],
  [/^\s*rollback\b/i, 'DebugPDO::rollBack'],
];

/**
 * Drizzle ORM Logger that feeds every executed query to the profiling
 * emitter.
 *
 * Drizzle calls `logQuery(query, params)` before a query runs and never
 * reports its duration, so lines carry 0 sec and the heap usage at the time
 * of the call.
 */
export class ProfilingDrizzleLogger implements DrizzleLogger {
  constructor(private readonly emitter: StatementLogEmitter) {}

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  logQuery(query: string, _params: unknown[]): void {
    this.emitter.emit(this.classify(query), query, {
      durationSeconds: 0,
      memoryBytes: process.memoryUsage().heapUsed,
    });
  }

  private classify(query: string): InstrumentedMethod {
    for (const [pattern, method] of TRANSACTION_METHODS) {
      if (pattern.test(query)) return method;
    }
    return QUERY_EXECUTION_MARKER;
  }
}
