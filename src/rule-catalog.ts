/**
 * Rule Catalog - The fixed table of validation rules
 *
 * Every RuleName maps to exactly one definition; the Record type makes a
 * missing entry a compile error. Definitions only answer "does this value
 * pass?". Argument checks and error recording live in RuleEngine.
 */

import { RuleName } from './types';
import type { InputValue, MessageKey } from './types';
import {
  toText,
  isEmpty,
  characterLength,
  strictEquals,
  isValidEmail,
  isValidUrl,
  isValidIp,
  isBooleanLike
} from './value-utils';

export type ArgumentKind = 'none' | 'length' | 'field' | 'pattern';

interface BaseRule {
  name: RuleName;
  message: MessageKey;
  /**
   * When true, an empty value passes without evaluating the rule.
   * required, accepted, alfa and alfa_num always evaluate.
   */
  skipsEmpty: boolean;
}

export interface PlainRule extends BaseRule {
  argument: 'none';
  passes(value: InputValue): boolean;
}

export interface LengthRule extends BaseRule {
  argument: 'length';
  passes(value: InputValue, limit: number): boolean;
}

export interface FieldRule extends BaseRule {
  argument: 'field';
  /** Compared field when the rule takes no argument (confirmed) */
  fixedField?: string;
  passes(value: InputValue, other: InputValue): boolean;
}

export interface PatternRule extends BaseRule {
  argument: 'pattern';
  passes(value: InputValue, pattern: RegExp): boolean;
}

export type RuleDefinition = PlainRule | LengthRule | FieldRule | PatternRule;

export const CONFIRMATION_FIELD = 'password_confirmation';

const STRONG_PATTERN = /^\S*(?=\S{8,})(?=\S*[a-z])(?=\S*[A-Z])(?=\S*\d)\S*$/;
const LETTERS_ONLY = /^[A-Za-z]+$/;
const LETTERS_AND_DIGITS = /^[A-Za-z0-9]+$/;

const ACCEPTED_VALUES: readonly InputValue[] = ['1', 'yes', true, 'on'];

/** Run a textual check; lists have no text and fail */
function textMatches(value: InputValue, check: (text: string) => boolean): boolean {
  const text = toText(value);
  return text !== null && check(text);
}

const definitions: Record<RuleName, RuleDefinition> = {
  [RuleName.REQUIRED]: {
    name: RuleName.REQUIRED,
    message: 'required',
    argument: 'none',
    skipsEmpty: false,
    passes: (value: InputValue) => !isEmpty(value)
  },
  [RuleName.STRONG]: {
    name: RuleName.STRONG,
    message: 'strong',
    argument: 'none',
    skipsEmpty: true,
    passes: (value: InputValue) => textMatches(value, (text) => STRONG_PATTERN.test(text))
  },
  [RuleName.MIN]: {
    name: RuleName.MIN,
    message: 'min',
    argument: 'length',
    skipsEmpty: true,
    passes: (value: InputValue, limit: number) => textMatches(value, (text) => characterLength(text) >= limit)
  },
  [RuleName.MAX]: {
    name: RuleName.MAX,
    message: 'max',
    argument: 'length',
    skipsEmpty: true,
    // Strictly less: max:50 rejects a 50 character value
    passes: (value: InputValue, limit: number) => textMatches(value, (text) => characterLength(text) < limit)
  },
  [RuleName.EMAIL]: {
    name: RuleName.EMAIL,
    message: 'email',
    argument: 'none',
    skipsEmpty: true,
    passes: (value: InputValue) => textMatches(value, isValidEmail)
  },
  [RuleName.ALFA]: {
    name: RuleName.ALFA,
    message: 'string',
    argument: 'none',
    skipsEmpty: false,
    passes: (value: InputValue) => textMatches(value, (text) => LETTERS_ONLY.test(text))
  },
  [RuleName.ALFA_NUM]: {
    name: RuleName.ALFA_NUM,
    message: 'alpha_num',
    argument: 'none',
    skipsEmpty: false,
    passes: (value: InputValue) => textMatches(value, (text) => LETTERS_AND_DIGITS.test(text))
  },
  [RuleName.CONFIRMED]: {
    name: RuleName.CONFIRMED,
    message: 'confirmed',
    argument: 'field',
    fixedField: CONFIRMATION_FIELD,
    skipsEmpty: true,
    passes: strictEquals
  },
  [RuleName.SAME]: {
    name: RuleName.SAME,
    message: 'same',
    argument: 'field',
    skipsEmpty: true,
    passes: strictEquals
  },
  [RuleName.ACCEPTED]: {
    name: RuleName.ACCEPTED,
    message: 'accepted',
    argument: 'none',
    skipsEmpty: false,
    passes: (value: InputValue) => ACCEPTED_VALUES.includes(value)
  },
  [RuleName.URL]: {
    name: RuleName.URL,
    message: 'url',
    argument: 'none',
    skipsEmpty: true,
    passes: (value: InputValue) => textMatches(value, isValidUrl)
  },
  [RuleName.REGEX]: {
    name: RuleName.REGEX,
    message: 'regex',
    argument: 'pattern',
    skipsEmpty: true,
    passes: (value: InputValue, pattern: RegExp) => textMatches(value, (text) => pattern.test(text))
  },
  [RuleName.IP]: {
    name: RuleName.IP,
    message: 'ip',
    argument: 'none',
    skipsEmpty: true,
    passes: (value: InputValue) => textMatches(value, isValidIp)
  },
  [RuleName.BOOLEAN]: {
    name: RuleName.BOOLEAN,
    message: 'boolean',
    argument: 'none',
    skipsEmpty: true,
    passes: isBooleanLike
  }
};

export const RULE_CATALOG: Readonly<Record<RuleName, RuleDefinition>> = Object.freeze(definitions);

const RULE_NAMES: ReadonlySet<string> = new Set<string>(Object.values(RuleName));

export function isRuleName(name: string): name is RuleName {
  return RULE_NAMES.has(name);
}
