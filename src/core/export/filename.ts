// src/core/export/filename.ts
import {
  INVALID_FILENAME_CHARS,
  MAX_FILENAME_LENGTH,
  UNTITLED_PLACEHOLDER,
} from '../config/constants.js';

// `.` and `..` would resolve outside the output directory
const DOTS_ONLY = /^\.+$/;
const HIGH_SURROGATE_END = /[\uD800-\uDBFF]$/;

/**
 * Turns a free-text title into a file or directory name.
 *
 * Reserved characters become `_`, whitespace runs collapse to one space and
 * long titles are cut at the last space inside `maxLength`, never inside a
 * surrogate pair. Names made only of dots become the placeholder. The result is
 * stable: sanitizing it again returns it unchanged.
 */
export function sanitizeTitle(title: string, maxLength: number = MAX_FILENAME_LENGTH): string {
  if (!Number.isInteger(maxLength) || maxLength < 1) {
    throw new RangeError(`maxLength must be a positive integer, got ${maxLength}`);
  }

  let safe = title
    .replace(INVALID_FILENAME_CHARS, '_')
    .replace(/\s+/g, ' ')
    .trim();

  if (!safe || DOTS_ONLY.test(safe)) {
    safe = UNTITLED_PLACEHOLDER;
  }

  if (safe.length > maxLength) {
    let head = safe.slice(0, maxLength);
    if (HIGH_SURROGATE_END.test(head)) {
      head = head.slice(0, -1);
    }
    const boundary = head.lastIndexOf(' ');
    safe = (boundary > 0 ? head.slice(0, boundary) : head).trim();

    if (!safe || DOTS_ONLY.test(safe)) {
      safe = UNTITLED_PLACEHOLDER.slice(0, maxLength);
    }
  }

  return safe;
}
