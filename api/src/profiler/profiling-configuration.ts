export const PROFILING_KEYS = {
  METHOD_DETAILS: 'profiling.logging.details.method.enabled',
  TIME_DETAILS: 'profiling.logging.details.time.enabled',
  MEMORY_DETAILS: 'profiling.logging.details.mem.enabled',
  METHODS: 'profiling.logging.methods',
} as const;

const CLASSMAP_PREFIX = 'classmap.';

/** Marker substring of a query-execution log line. */
export const QUERY_EXECUTION_MARKER = 'DebugPDOStatement::execute';

export const INSTRUMENTED_METHODS = [
  'DebugPDO::open', // connection opened
  'DebugPDO::close', // connection closed
  'DebugPDO::exec', // query
  'DebugPDO::query', // query
  'DebugPDO::beginTransaction',
  'DebugPDO::commit',
  'DebugPDO::rollBack',
  QUERY_EXECUTION_MARKER, // query from a prepared statement
] as const;

export type InstrumentedMethod = (typeof INSTRUMENTED_METHODS)[number];

/**
 * Flat key/value configuration shared by the ORM-side log emitter and the
 * collector's caller resolver (class map lookups).
 */
export class ProfilingConfiguration {
  private readonly parameters = new Map<string, unknown>();

  constructor(initial: Record<string, unknown> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.parameters.set(key, value);
    }
  }

  setParameter(key: string, value: unknown): this {
    this.parameters.set(key, value);
    return this;
  }

  /** Stored value for `key`, or `defaultValue` when the key was never set. */
  getParameter(key: string, defaultValue: unknown = null): unknown {
    return this.parameters.has(key) ? this.parameters.get(key) : defaultValue;
  }

  isEnabled(key: string): boolean {
    return this.getParameter(key, false) === true;
  }

  /** Instrumented methods, or an empty list when none are configured. */
  getMethods(): readonly string[] {
    const methods = this.getParameter(PROFILING_KEYS.METHODS, []);
    if (!Array.isArray(methods)) return [];
    return methods.filter((m): m is string => typeof m === 'string');
  }

  /** Mark a type as application code for caller attribution. */
  registerClass(typeName: string, filePath: string): this {
    return this.setParameter(CLASSMAP_PREFIX + typeName, filePath);
  }

  getFlatParameters(): Readonly<Record<string, unknown>> {
    return Object.freeze(Object.fromEntries(this.parameters));
  }
}

/**
 * Turn on method, time and memory details for every instrumented operation.
 * Safe to call more than once.
 */
export function enableProfiling(config: ProfilingConfiguration): ProfilingConfiguration {
  return config
    .setParameter(PROFILING_KEYS.METHOD_DETAILS, true)
    .setParameter(PROFILING_KEYS.TIME_DETAILS, true)
    .setParameter(PROFILING_KEYS.MEMORY_DETAILS, true)
    .setParameter(PROFILING_KEYS.METHODS, [...INSTRUMENTED_METHODS]);
}
