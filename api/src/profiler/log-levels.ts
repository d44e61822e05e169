/**
 * Severity scale used by the ORM when it writes log lines (syslog order,
 * most severe first).
 */
export const OrmLogLevel = {
  EMERG: 0,
  ALERT: 1,
  CRIT: 2,
  ERR: 3,
  WARNING: 4,
  NOTICE: 5,
  INFO: 6,
  DEBUG: 7,
} as const;

export type OrmLogLevel = (typeof OrmLogLevel)[keyof typeof OrmLogLevel];

/** Standard severity names understood by downstream loggers. */
export const LOG_LEVEL_NAMES = [
  'emergency',
  'alert',
  'critical',
  'error',
  'warning',
  'notice',
  'info',
  'debug',
] as const;

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

const LEVEL_MAP: Record<OrmLogLevel, LogLevelName> = {
  [OrmLogLevel.EMERG]: 'emergency',
  [OrmLogLevel.ALERT]: 'alert',
  [OrmLogLevel.CRIT]: 'critical',
  [OrmLogLevel.ERR]: 'error',
  [OrmLogLevel.WARNING]: 'warning',
  [OrmLogLevel.NOTICE]: 'notice',
  [OrmLogLevel.INFO]: 'info',
  [OrmLogLevel.DEBUG]: 'debug',
};

export class UnknownLogLevelError extends Error {
  constructor(readonly level: unknown) {
    super(`No log level mapping for ORM severity ${String(level)}`);
    this.name = 'UnknownLogLevelError';
  }
}

function isOrmLogLevel(level: number): level is OrmLogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_MAP, level);
}

/**
 * Translate an ORM severity into the standard level name.
 * Throws {@link UnknownLogLevelError} for anything outside the table.
 */
export function convertLogLevel(level: number): LogLevelName {
  if (!Number.isInteger(level) || !isOrmLogLevel(level)) {
    throw new UnknownLogLevelError(level);
  }
  return LEVEL_MAP[level];
}
