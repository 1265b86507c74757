/**
 * Message Catalog - Error message templates and positional rendering
 */

import type { MessageKey } from './types';

export const MESSAGES: Readonly<Record<MessageKey, string>> = Object.freeze({
  required: 'The :attribute field is required.',
  string: 'The :attribute must be a string.',
  strong: 'The :attribute is not strong enough. Try a combination of letters, numbers and symbols.',
  min: 'The :attribute must be at least :min characters.',
  max: 'The :attribute must be less :max characters.',
  email: 'The :attribute must be a valid email address.',
  alpha_num: 'The :attribute may only contain letters and numbers.',
  confirmed: 'The :attribute confirmation does not match.',
  same: 'The :attribute and :other must match.',
  accepted: 'The :attribute must be accepted.',
  url: 'The :attribute format is invalid.',
  regex: 'The :attribute format is invalid.',
  ip: 'The :attribute must be a valid IP address.',
  boolean: 'The :attribute field must be true or false.'
});

export type TemplateSegment =
  | { kind: 'text'; text: string }
  | { kind: 'slot'; index: number };

const PLACEHOLDER = /:[^:\s]+/g;

/**
 * Split a template into literal text and placeholder slots.
 *
 * Slots are numbered by the order in which each distinct placeholder first
 * appears; the names themselves are ignored. Slot 0 takes the attribute,
 * slot 1 the rule argument.
 */
export function compileTemplate(template: string): TemplateSegment[] {
  const segments: TemplateSegment[] = [];
  const slots = new Map<string, number>();
  let cursor = 0;

  for (const match of template.matchAll(PLACEHOLDER)) {
    const start = match.index ?? 0;
    if (start > cursor) {
      segments.push({ kind: 'text', text: template.substring(cursor, start) });
    }

    const token = match[0];
    let index = slots.get(token);
    if (index === undefined) {
      index = slots.size;
      slots.set(token, index);
    }
    segments.push({ kind: 'slot', index });

    cursor = start + token.length;
  }

  if (cursor < template.length) {
    segments.push({ kind: 'text', text: template.substring(cursor) });
  }

  return segments;
}

/**
 * Fill compiled segments. Slots beyond the two we have render as ''.
 */
export function renderTemplate(segments: readonly TemplateSegment[], attribute: string, value?: string): string {
  const values = [attribute, value ?? ''];

  return segments
    .map((segment) => (segment.kind === 'text' ? segment.text : values[segment.index] ?? ''))
    .join('');
}

// Compiled on first use, one entry per key
const compiled = new Map<MessageKey, TemplateSegment[]>();

/**
 * Render a catalog message for a field
 */
export function renderMessage(key: MessageKey, attribute: string, value?: string): string {
  let segments = compiled.get(key);
  if (!segments) {
    segments = compileTemplate(MESSAGES[key]);
    compiled.set(key, segments);
  }
  return renderTemplate(segments, attribute, value);
}
