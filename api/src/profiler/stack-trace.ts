import { fileURLToPath } from 'url';

/** Call separator between declaring type and function in caller labels. */
export type CallOperator = '->' | '::';

/**
 * One frame of a captured call stack. All fields are optional: native and
 * anonymous frames carry only some of them.
 *
 * `typeName` is the receiver's class, not the class that declares the
 * method: an inherited `find()` called on a `BookQuery` reports `BookQuery`.
 */
export interface StackFrame {
  /** Receiver type (class) name */
  typeName?: string;
  functionName?: string;
  operator?: CallOperator;
  /** Absolute source path */
  fileName?: string;
  line?: number;
}

/** Produces a snapshot of the current call stack, innermost frame first. */
export type StackTraceProvider = (
  boundary?: (...args: never[]) => unknown,
) => StackFrame[];

const MAX_FRAMES = 50;

function toStackFrame(site: NodeJS.CallSite): StackFrame {
  const frame: StackFrame = {};
  const rawType = site.getTypeName();
  const functionName = site.getMethodName() ?? site.getFunctionName();

  // Static calls: the receiver is the class itself, so V8 reports `Function`
  if (rawType === 'Function') {
    frame.operator = '::';
    const dot = functionName?.lastIndexOf('.') ?? -1;
    if (functionName && dot > 0) {
      frame.typeName = functionName.slice(0, dot);
      frame.functionName = functionName.slice(dot + 1);
    } else if (functionName) {
      frame.functionName = functionName;
    }
  } else {
    if (rawType && !site.isToplevel()) {
      frame.typeName = rawType;
      frame.operator = '->';
    }
    if (functionName) {
      frame.functionName = functionName;
    }
  }

  const fileName = site.getFileName();
  if (fileName) {
    frame.fileName = fileName.startsWith('file://')
      ? fileURLToPath(fileName)
      : fileName;
  }
  const line = site.getLineNumber();
  if (typeof line === 'number') {
    frame.line = line;
  }
  return frame;
}

/**
 * Capture the current call stack through the V8 structured stack trace API.
 *
 * Line numbers are those of the code V8 runs. When sources are compiled in
 * memory (ts-jest, tsx) without `--enable-source-maps`, `fileName` is the
 * `.ts` path while `line` points into the emitted JavaScript.
 *
 * Frames above (and including) the most recent call to `boundary` are
 * omitted, so a collector can pass its own entry point and see only its
 * callers.
 */
export const captureStackFrames: StackTraceProvider = (boundary) => {
  const originalPrepare = Error.prepareStackTrace;
  const originalLimit = Error.stackTraceLimit;
  const holder: { stack?: unknown } = {};
  try {
    Error.stackTraceLimit = MAX_FRAMES;
    Error.prepareStackTrace = (_err, sites) => sites;
    Error.captureStackTrace(holder, boundary ?? captureStackFrames);
    const sites = holder.stack;
    if (!Array.isArray(sites)) return [];
    return sites.map((site: NodeJS.CallSite) => toStackFrame(site));
  } finally {
    Error.prepareStackTrace = originalPrepare;
    Error.stackTraceLimit = originalLimit;
  }
};
