/**
 * Utility functions for naming package files
 */

/** Characters that are unsafe in file names on at least one common OS */
const UNSAFE_CHARS = /[<>:"/\\|?*\x00-\x1f]/g;

/** Device names Windows refuses as file names */
const RESERVED_NAMES = new Set([
  'CON', 'PRN', 'AUX', 'NUL',
  'COM1', 'COM2', 'COM3', 'COM4', 'COM5', 'COM6', 'COM7', 'COM8', 'COM9',
  'LPT1', 'LPT2', 'LPT3', 'LPT4', 'LPT5', 'LPT6', 'LPT7', 'LPT8', 'LPT9',
]);

export const MAX_FILENAME_LENGTH = 100;

export const DEFAULT_PACKAGE_NAME = 'Question_Package';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Make a name safe to use as a file name
 * @param name - Name to clean
 * @param replacement - Character that replaces unsafe ones
 * @returns the cleaned name, or DEFAULT_PACKAGE_NAME when nothing usable is left
 * @example
 * sanitizeFilename('Unit 3: Forces?') // returns 'Unit 3_ Forces'
 * sanitizeFilename('con') // returns 'con_file'
 */
export function sanitizeFilename(name: string, replacement = '_'): string {
  const repeated = new RegExp(`${escapeRegExp(replacement)}+`, 'g');
  const edges = new RegExp(`^[${escapeRegExp(replacement)}.]+|[${escapeRegExp(replacement)}.]+$`, 'g');

  let sanitized = name
    .trim()
    .replace(UNSAFE_CHARS, replacement)
    .replace(repeated, replacement)
    .replace(edges, '');

  const stem = sanitized.replace(/\.[^.]*$/, '').toUpperCase();
  if (RESERVED_NAMES.has(stem)) {
    sanitized = `${sanitized}_file`;
  }

  if (sanitized.length > MAX_FILENAME_LENGTH) {
    sanitized = sanitized.slice(0, MAX_FILENAME_LENGTH);
  }

  return sanitized || DEFAULT_PACKAGE_NAME;
}

/**
 * Package name for an assessment title: a sanitized file name without spaces
 * @example
 * packageNameFor('Unit 3: Forces?') // returns 'Unit_3_Forces'
 */
export function packageNameFor(title: string): string {
  return sanitizeFilename(title.replace(/\s+/g, '_'));
}
