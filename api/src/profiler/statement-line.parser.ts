export interface ParsedStatementLine {
  sql: string;
  /** Seconds */
  duration: number;
  /** Bytes */
  memory: number;
}

const SEGMENT_SEPARATOR = '|';
const DURATION_PATTERN = /(\d+\.\d+)/;
const MEMORY_PATTERN = /(\d+(?:\.\d+)?)(?:\s*([A-Z]{1,2}))?/;

const UNIT_MULTIPLIERS: Record<string, number> = {
  KB: 1024,
  MB: 1024 * 1024,
};

/** Split on `|` into at most `limit` parts; the last part keeps the rest. */
function splitSegments(line: string, limit: number): string[] {
  const parts: string[] = [];
  let rest = line;
  while (parts.length < limit - 1) {
    const idx = rest.indexOf(SEGMENT_SEPARATOR);
    if (idx === -1) break;
    parts.push(rest.slice(0, idx));
    rest = rest.slice(idx + 1);
  }
  parts.push(rest);
  return parts;
}

/**
 * Parse a query-execution log line of the shape
 * `marker | duration | memory | sql`.
 *
 * Unparsable duration or memory segments read as 0, a missing SQL segment as
 * an empty string.
 */
export function parseStatementLine(line: string): ParsedStatementLine {
  const [, durationSegment = '', memorySegment = '', sqlSegment = ''] =
    splitSegments(line, 4);

  let duration = 0;
  const durationMatch = DURATION_PATTERN.exec(durationSegment);
  if (durationMatch) {
    duration = parseFloat(durationMatch[1]);
  }

  let memory = 0;
  const memoryMatch = MEMORY_PATTERN.exec(memorySegment);
  if (memoryMatch) {
    memory = parseFloat(memoryMatch[1]);
    const unit = memoryMatch[2];
    if (unit !== undefined && unit in UNIT_MULTIPLIERS) {
      memory *= UNIT_MULTIPLIERS[unit];
    }
  }

  return { sql: sqlSegment.trim(), duration, memory };
}
