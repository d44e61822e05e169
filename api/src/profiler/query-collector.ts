import type {
  QueriesSnapshotDto,
  StatementDto,
  WidgetAssetsDto,
  WidgetDto,
} from '@query-profiler/contract';
import { resolveCaller, DEFAULT_SKIPPED_TYPES } from './caller-resolver';
import { formatBytes, formatDuration } from './format';
import { convertLogLevel, OrmLogLevel } from './log-levels';
import type { DownstreamLogger } from './nest-downstream-logger';
import {
  ProfilingConfiguration,
  QUERY_EXECUTION_MARKER,
} from './profiling-configuration';
import { parseStatementLine } from './statement-line.parser';
import type { BasicLogger } from './statement-log.emitter';
import { captureStackFrames, type StackTraceProvider } from './stack-trace';

export interface StatementRecord {
  readonly sql: string;
  readonly isSuccess: boolean;
  /** Seconds */
  readonly duration: number;
  readonly durationDisplay: string;
  /** Bytes */
  readonly memory: number;
  readonly memoryDisplay: string;
  readonly callerLabel: string | null;
  readonly callerMessage: string | null;
}

export interface QueryCollectorOptions {
  /** Logger that non-query messages (and, optionally, query summaries) go to. */
  logger?: DownstreamLogger;
  /** Source of the class map used for caller attribution. */
  configuration?: ProfilingConfiguration;
  documentRoot?: string;
  /** Extra types never attributed as callers, on top of `ModelCriteria`. */
  skippedTypes?: Iterable<string>;
  captureStack?: StackTraceProvider;
  logQueriesToLogger?: boolean;
}

interface RecordedStatement {
  sql: string;
  durationDisplay: string;
}

export const QUERIES_COLLECTOR_NAME = 'queries';

/**
 * ORM logger that doubles as a debug bar data collector.
 *
 * Query-execution lines are parsed, attributed to the calling application
 * code and kept for {@link collect}; every other message is forwarded to the
 * downstream logger. Hand an instance to whatever owns the database
 * connection.
 */
export class QueryCollector implements BasicLogger {
  private readonly statements: StatementRecord[] = [];
  private accumulatedDuration = 0;
  private peakMemory = 0;
  private logQueriesToLogger: boolean;

  private readonly logger: DownstreamLogger | undefined;
  private readonly configuration: ProfilingConfiguration;
  private readonly documentRoot: string | undefined;
  private readonly skippedTypes: ReadonlySet<string>;
  private readonly captureStack: StackTraceProvider;

  constructor(options: QueryCollectorOptions = {}) {
    this.logger = options.logger;
    this.configuration = options.configuration ?? new ProfilingConfiguration();
    this.documentRoot = options.documentRoot;
    // Level helpers call log(), so their frames sit below the capture boundary
    this.skippedTypes = new Set([
      ...DEFAULT_SKIPPED_TYPES,
      QueryCollector.name,
      new.target.name,
      ...(options.skippedTypes ?? []),
    ]);
    this.captureStack = options.captureStack ?? captureStackFrames;
    this.logQueriesToLogger = options.logQueriesToLogger ?? false;
  }

  setLogQueriesToLogger(enable = true): this {
    this.logQueriesToLogger = enable;
    return this;
  }

  isLogQueriesToLogger(): boolean {
    return this.logQueriesToLogger;
  }

  emergency(message: string): void {
    this.log(message, OrmLogLevel.EMERG);
  }

  alert(message: string): void {
    this.log(message, OrmLogLevel.ALERT);
  }

  crit(message: string): void {
    this.log(message, OrmLogLevel.CRIT);
  }

  err(message: string): void {
    this.log(message, OrmLogLevel.ERR);
  }

  warning(message: string): void {
    this.log(message, OrmLogLevel.WARNING);
  }

  notice(message: string): void {
    this.log(message, OrmLogLevel.NOTICE);
  }

  info(message: string): void {
    this.log(message, OrmLogLevel.INFO);
  }

  debug(message: string): void {
    this.log(message, OrmLogLevel.DEBUG);
  }

  /**
   * Entry point for every ORM log line. A missing severity is treated as
   * debug, the level the ORM writes query lines at.
   */
  log(message: string, severity: OrmLogLevel = OrmLogLevel.DEBUG): void {
    if (message.includes(QUERY_EXECUTION_MARKER)) {
      const { sql, durationDisplay } = this.recordStatement(message);
      if (!this.logQueriesToLogger) {
        return;
      }
      message = `${sql} (${durationDisplay})`;
    }

    if (this.logger !== undefined) {
      this.logger.log(convertLogLevel(severity), message);
    }
  }

  protected recordStatement(message: string): RecordedStatement {
    const { sql, duration, memory } = parseStatementLine(message);
    const caller = resolveCaller(this.captureStack(QueryCollector.prototype.log), {
      classMap: this.configuration.getFlatParameters(),
      documentRoot: this.documentRoot,
      skippedTypes: this.skippedTypes,
    });

    const durationDisplay = formatDuration(duration);
    this.statements.push(
      Object.freeze({
        sql,
        isSuccess: true,
        duration,
        durationDisplay,
        memory,
        memoryDisplay: formatBytes(memory),
        callerLabel: caller?.info ?? null,
        callerMessage: caller?.message ?? null,
      }),
    );
    this.accumulatedDuration += duration;
    this.peakMemory = Math.max(this.peakMemory, memory);

    return { sql, durationDisplay };
  }

  getStatements(): readonly StatementRecord[] {
    return [...this.statements];
  }

  collect(): QueriesSnapshotDto {
    return {
      nb_statements: this.statements.length,
      nb_failed_statements: 0,
      accumulated_duration: this.accumulatedDuration,
      accumulated_duration_str: formatDuration(this.accumulatedDuration),
      peak_memory_usage: this.peakMemory,
      peak_memory_usage_str: formatBytes(this.peakMemory),
      statements: this.statements.map(toStatementDto),
    };
  }

  getName(): string {
    return QUERIES_COLLECTOR_NAME;
  }

  getWidgets(): Record<string, WidgetDto> {
    return {
      [QUERIES_COLLECTOR_NAME]: {
        icon: 'bolt',
        widget: 'QueryProfiler.Widgets.SQLQueriesWidget',
        map: QUERIES_COLLECTOR_NAME,
        default: '[]',
      },
      [`${QUERIES_COLLECTOR_NAME}:badge`]: {
        map: `${QUERIES_COLLECTOR_NAME}.nb_statements`,
        default: 0,
      },
    };
  }

  getAssets(): WidgetAssetsDto {
    return {
      css: 'widgets/sqlqueries/widget.css',
      js: 'widgets/sqlqueries/widget.js',
    };
  }
}

function toStatementDto(record: StatementRecord): StatementDto {
  return {
    sql: record.sql,
    is_success: record.isSuccess,
    duration: record.duration,
    duration_str: record.durationDisplay,
    memory: record.memory,
    memory_str: record.memoryDisplay,
    caller: record.callerLabel,
    caller_str: record.callerMessage,
  };
}
