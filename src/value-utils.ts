/**
 * Value helpers shared by the rule catalog
 */

import { z } from 'zod';
import type { InputValue } from './types';

// Local part is capped at 64 characters
const EMAIL_SCHEMA = z
  .string()
  .email()
  .refine((text) => text.indexOf('@') <= 64);

// A scheme with `://` and a non-empty host, or a scheme that takes no host
const URL_SHAPE = /^(?=\S+$)(?:[A-Za-z][A-Za-z0-9+.-]*:\/\/[^/?#]+|(?:mailto|news|file):)/i;

const URL_SCHEMA = z.string().url().regex(URL_SHAPE);

const IP_SCHEMA = z.string().ip();

const BOOLEAN_TOKENS = new Set(['1', '0', 'true', 'false', 'on', 'off', 'yes', 'no']);

/**
 * "Empty" as the catalog understands it: absent, null, "", "0", 0, false or
 * an empty list.
 */
export function isEmpty(value: InputValue): boolean {
  if (value === undefined || value === null) {
    return true;
  }
  if (typeof value === 'string') {
    return value === '' || value === '0';
  }
  if (typeof value === 'number') {
    return value === 0;
  }
  if (typeof value === 'boolean') {
    return !value;
  }
  return value.length === 0;
}

/**
 * Text form of a value for textual checks. Lists have none.
 */
export function toText(value: InputValue): string | null {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  if (typeof value === 'boolean') {
    return value ? '1' : '';
  }
  return null;
}

/** Length in Unicode code points */
export function characterLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Type-and-value equality; lists compare element by element.
 */
export function strictEquals(left: InputValue, right: InputValue): boolean {
  if (Array.isArray(left) && Array.isArray(right)) {
    return left.length === right.length && left.every((item, index) => item === right[index]);
  }
  return left === right;
}

export function isValidEmail(text: string): boolean {
  return EMAIL_SCHEMA.safeParse(text).success;
}

/**
 * A scheme followed by `://` and a host, or one of the host-less schemes
 * (mailto:, news:, file:).
 */
export function isValidUrl(text: string): boolean {
  return URL_SCHEMA.safeParse(text).success;
}

/** IPv4 or IPv6 */
export function isValidIp(text: string): boolean {
  return IP_SCHEMA.safeParse(text).success;
}

export function isBooleanLike(value: InputValue): boolean {
  if (typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return value === 0 || value === 1;
  }
  if (typeof value === 'string') {
    return BOOLEAN_TOKENS.has(value.trim().toLowerCase());
  }
  return false;
}

/**
 * Compile a `regex` rule argument. `/body/flags` takes the flags i, m, s and
 * u; anything not wrapped in slashes is used as the pattern body.
 * Throws SyntaxError for a pattern that does not compile or a flag we don't take.
 */
export function compilePattern(source: string): RegExp {
  const delimited = /^\/(.*)\/([A-Za-z]*)$/s.exec(source);

  if (!delimited) {
    return new RegExp(source);
  }

  const [, body, flags] = delimited;
  const unsupported = flags.replace(/[imsu]/g, '');
  if (unsupported !== '') {
    throw new SyntaxError(`Unsupported pattern flags: ${unsupported}`);
  }

  return new RegExp(body, flags);
}
