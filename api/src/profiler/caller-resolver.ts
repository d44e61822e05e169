import * as fs from 'fs';
import * as path from 'path';
import type { StackFrame } from './stack-trace';

export interface CallerAttribution {
  /** `basename:line` */
  info: string;
  /** `Called X in Y on line Z` */
  message: string;
}

export interface CallerResolverOptions {
  /**
   * Flat configuration map; a `classmap.<Type>` key marks a type as part of
   * the application even when its file lives in a dependency directory.
   */
  classMap?: Readonly<Record<string, unknown>>;
  /** Root for relative file display. Defaults to the working directory. */
  documentRoot?: string;
  /** Types never attributed as the caller (query builders, instrumentation). */
  skippedTypes?: ReadonlySet<string>;
  /** Directory names whose files count as third-party code. */
  dependencyDirs?: readonly string[];
  /** Path separator; tests pin it to `/`. */
  sep?: string;
}

export const DEFAULT_SKIPPED_TYPES: ReadonlySet<string> = new Set([
  'ModelCriteria',
]);

export const DEFAULT_DEPENDENCY_DIRS = ['vendor', 'node_modules'] as const;

const BASE_PREFIX = 'Base';
const UNKNOWN = 'unknown';

interface FileInfo {
  basename: string;
  file: string;
  line: number;
}

function safeRealpath(p: string): string | undefined {
  try {
    return fs.realpathSync(p);
  } catch {
    return undefined;
  }
}

/**
 * Resolve the project root from the document root. A root named `web` is the
 * public directory of a project; the project itself is one level up.
 */
export function resolveProjectRoot(documentRoot: string = process.cwd()): string {
  let root = safeRealpath(documentRoot) ?? path.resolve(documentRoot);
  if (path.basename(root) === 'web') {
    const parent = path.join(root, '..');
    root = safeRealpath(parent) ?? path.resolve(parent);
  }
  return root;
}

/**
 * Path of `file` relative to the project root. Files that cannot be resolved
 * on disk are returned unchanged.
 */
export function getRelativeFile(
  file: string,
  documentRoot?: string,
  sep: string = path.sep,
): string {
  const target = safeRealpath(file);
  if (target === undefined) {
    return file;
  }
  const root = resolveProjectRoot(documentRoot);
  return target.split(root + sep).join('');
}

function isGeneratedBaseFile(fileName: string, sep: string): boolean {
  return fileName.includes(`${sep}om${sep}${BASE_PREFIX}`);
}

/**
 * A generated `BaseFoo` frame whose immediate caller is the derived `Foo`
 * is collapsed into the derived frame.
 */
function isBaseOfNextFrame(frame: StackFrame, next: StackFrame | undefined): boolean {
  if (!frame.typeName?.startsWith(BASE_PREFIX)) return false;
  if (next?.typeName === undefined) return false;
  return BASE_PREFIX + next.typeName === frame.typeName;
}

function isUnmappedDependency(
  frame: StackFrame,
  classMap: Readonly<Record<string, unknown>>,
  dependencyDirs: readonly string[],
  sep: string,
): boolean {
  const { typeName, fileName } = frame;
  if (fileName === undefined) return false;
  const inDependencyDir = dependencyDirs.some((dir) =>
    fileName.includes(`${sep}${dir}${sep}`),
  );
  if (!inDependencyDir) return false;
  // Module functions and callbacks have no type and never appear in the map
  if (typeName === undefined) return true;
  return !Object.prototype.hasOwnProperty.call(classMap, `classmap.${typeName}`);
}

function buildLabel(frame: StackFrame): string {
  if (frame.typeName === undefined && frame.functionName === undefined) {
    return UNKNOWN;
  }
  return `${frame.typeName ?? ''}${frame.operator ?? '->'}${frame.functionName ?? ''}`;
}

function buildFileInfo(
  frame: StackFrame,
  documentRoot: string | undefined,
  sep: string,
): FileInfo {
  if (frame.fileName === undefined || frame.line === undefined) {
    return { basename: UNKNOWN, file: UNKNOWN, line: 0 };
  }
  return {
    basename: path.basename(frame.fileName),
    file: getRelativeFile(frame.fileName, documentRoot, sep),
    line: frame.line,
  };
}

/**
 * Find the application frame that issued a query.
 *
 * Frames are tested innermost first; a frame is skipped when
 * 1. its file lives in a generated `om/Base` directory,
 * 2. its type is one of the skipped types,
 * 3. it is a `BaseFoo` frame called directly from `Foo`,
 * 4. its file is under a dependency directory and its type is not in the
 *    class map (a frame without a type is never in the map).
 * The first frame that survives is the caller. Returns `undefined` when
 * every frame is skipped.
 */
export function resolveCaller(
  frames: readonly StackFrame[],
  options: CallerResolverOptions = {},
): CallerAttribution | undefined {
  const classMap = options.classMap ?? {};
  const skippedTypes = options.skippedTypes ?? DEFAULT_SKIPPED_TYPES;
  const dependencyDirs = options.dependencyDirs ?? DEFAULT_DEPENDENCY_DIRS;
  const sep = options.sep ?? path.sep;

  for (let i = 0; i < frames.length; i++) {
    const frame = frames[i];
    if (frame.fileName !== undefined && isGeneratedBaseFile(frame.fileName, sep)) {
      continue;
    }
    if (frame.typeName !== undefined && skippedTypes.has(frame.typeName)) {
      continue;
    }
    if (isBaseOfNextFrame(frame, frames[i + 1])) {
      continue;
    }
    if (isUnmappedDependency(frame, classMap, dependencyDirs, sep)) {
      continue;
    }

    const label = buildLabel(frame);
    const fileInfo = buildFileInfo(frame, options.documentRoot, sep);
    return {
      info: `${fileInfo.basename}:${fileInfo.line}`,
      message: `Called ${label} in ${fileInfo.file} on line ${fileInfo.line}`,
    };
  }
  return undefined;
}
