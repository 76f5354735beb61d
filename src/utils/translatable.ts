import type { JsonValue } from './json-traversal.js';

/**
 * Non-ASCII punctuation that menus use in place of its ASCII form:
 * left single quotation mark, full-width parentheses, full-width comma.
 */
export const ASCII_EQUIVALENTS: ReadonlySet<number> = new Set([0x2018, 0xff08, 0xff09, 0xff0c]);

const PUNCTUATION_OR_SEPARATOR = /[\p{P}\p{Z}]/u;

function isAsciiLike(char: string): boolean {
  const code = char.codePointAt(0) ?? 0;
  return code < 0x80 || ASCII_EQUIVALENTS.has(code);
}

export function isAscii(text: string): boolean {
  for (const char of text) {
    if (!isAsciiLike(char)) return false;
  }
  return true;
}

export function isTranslatableValue(value: JsonValue): value is string {
  return typeof value === 'string' && !isAscii(value);
}

/**
 * The part of a value worth transliterating: no ASCII, no punctuation,
 * no spacing. Empty when nothing is left.
 */
export function pinyinProjection(value: string): string {
  let projection = '';
  for (const char of value) {
    if (isAsciiLike(char) || PUNCTUATION_OR_SEPARATOR.test(char)) continue;
    projection += char;
  }
  return projection.trim();
}
