import * as fs from 'fs';
import * as path from 'path';
import { errorMessage } from '../errors';
import type { ActivityKind } from '../types';

export const BINARY_SENTINEL = '[Binary file]';

export interface CaptureOptions {
  maxContentChars: number;
  textExtensions: string[];
}

export function isTextFile(filePath: string, textExtensions: string[]): boolean {
  return textExtensions.includes(path.extname(filePath).toLowerCase());
}

/**
 * Tail of the file's current text for `modified` events, '' for other kinds.
 * Never throws: unreadable files yield an error sentinel.
 */
export function captureContent(filePath: string, kind: ActivityKind, opts: CaptureOptions): string {
  if (kind !== 'modified') return '';
  if (!isTextFile(filePath, opts.textExtensions)) return BINARY_SENTINEL;
  try {
    const content = fs.readFileSync(filePath, 'utf-8');
    return content.length > opts.maxContentChars ? `...${content.slice(-opts.maxContentChars)}` : content;
  } catch (err) {
    return `[Error reading file: ${errorMessage(err)}]`;
  }
}
