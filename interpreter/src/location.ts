/**
 * Source locations attached to every syntax tree node.
 */

import { StrataInternalError } from './errors';

export interface SourceLocation {
  readonly file: string;
  /** Line the construct starts on, as reported by the parser. */
  readonly startLine: number;
}

export function mkLocation(file: string, startLine: number): SourceLocation {
  if (file.length === 0) {
    throw new StrataInternalError('Source location requires a file name');
  }
  if (!Number.isInteger(startLine) || startLine < 0) {
    throw new StrataInternalError(`Invalid start line for ${file}: ${startLine}`);
  }
  return Object.freeze({ file, startLine });
}

/**
 * Render a location as `file:line`.
 */
export function describeLocation(location: SourceLocation): string {
  return `${location.file}:${location.startLine}`;
}
