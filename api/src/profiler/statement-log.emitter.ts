import { formatLogBytes } from './format';
import { OrmLogLevel } from './log-levels';
import {
  PROFILING_KEYS,
  type InstrumentedMethod,
  type ProfilingConfiguration,
} from './profiling-configuration';

/** Receiver of ORM log lines. */
export interface BasicLogger {
  log(message: string, severity?: OrmLogLevel): void;
}

export interface StatementDetails {
  durationSeconds?: number;
  memoryBytes?: number;
}

const DETAIL_GLUE = ' | ';

/**
 * ORM-side producer of profiling log lines.
 *
 * Lines look like `DebugPDOStatement::execute | 0.0123 sec | 1.50 KB | SELECT 1`;
 * each detail segment is present only when its configuration flag is on and
 * nothing is written for methods that are not instrumented.
 */
export class StatementLogEmitter {
  constructor(
    private readonly config: ProfilingConfiguration,
    private readonly target: BasicLogger,
  ) {}

  isInstrumented(method: InstrumentedMethod): boolean {
    return this.config.getMethods().includes(method);
  }

  emit(
    method: InstrumentedMethod,
    message: string,
    details: StatementDetails = {},
  ): void {
    if (!this.isInstrumented(method)) return;

    const segments: string[] = [];
    if (this.config.isEnabled(PROFILING_KEYS.METHOD_DETAILS)) {
      segments.push(method);
    }
    if (this.config.isEnabled(PROFILING_KEYS.TIME_DETAILS)) {
      segments.push(`${(details.durationSeconds ?? 0).toFixed(4)} sec`);
    }
    if (this.config.isEnabled(PROFILING_KEYS.MEMORY_DETAILS)) {
      segments.push(formatLogBytes(details.memoryBytes ?? process.memoryUsage().heapUsed));
    }
    segments.push(message);

    this.target.log(segments.join(DETAIL_GLUE), OrmLogLevel.DEBUG);
  }
}
