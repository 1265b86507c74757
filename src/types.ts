/**
 * Core type definitions for formcheck
 */

// ============================================================================
// Input Types
// ============================================================================

export type InputScalar = string | number | boolean | null;

/**
 * A single field value. Lists are accepted so that `required` can see an
 * empty container, but they are never validated element by element.
 */
export type InputValue = InputScalar | undefined | readonly InputScalar[];

export type InputData = Readonly<Record<string, InputValue>>;

// ============================================================================
// Rule Types
// ============================================================================

export enum RuleName {
  REQUIRED = 'required',
  STRONG = 'strong',
  MIN = 'min',
  MAX = 'max',
  EMAIL = 'email',
  ALFA = 'alfa',
  ALFA_NUM = 'alfa_num',
  CONFIRMED = 'confirmed',
  SAME = 'same',
  ACCEPTED = 'accepted',
  URL = 'url',
  REGEX = 'regex',
  IP = 'ip',
  BOOLEAN = 'boolean'
}

export type MessageKey =
  | 'required'
  | 'string'
  | 'strong'
  | 'min'
  | 'max'
  | 'email'
  | 'alpha_num'
  | 'confirmed'
  | 'same'
  | 'accepted'
  | 'url'
  | 'regex'
  | 'ip'
  | 'boolean';

/** Either `"required|min:8"` or `["required", "min:8"]` */
export type RuleDefinitionInput = string | readonly string[];

export type RuleSpecification = Readonly<Record<string, RuleDefinitionInput>>;

export interface RuleInvocation {
  /** Rule name as written (trimmed) */
  rule: string;
  /** Everything after the first `:`, if there was one */
  argument?: string;
  /** The token the invocation was parsed from */
  raw: string;
}

export interface FieldRules {
  field: string;
  invocations: RuleInvocation[];
}

/**
 * An invocation resolved against the catalog and the data, ready to run.
 */
export interface CompiledCheck {
  rule: RuleName;
  message: MessageKey;
  /** Fills the second placeholder of the message */
  messageValue?: string;
  /** Empty values pass without calling `test` */
  skipsEmpty: boolean;
  test(value: InputValue): boolean;
}

export interface CompiledField {
  field: string;
  checks: CompiledCheck[];
}

// ============================================================================
// CLI Types
// ============================================================================

export type OutputFormat = 'text' | 'json';

export interface CLIOptions {
  dataPath: string;
  rulesPath: string;
  format: OutputFormat;
  flat: boolean;      // Print all() instead of getErrors()
  verbose: boolean;
}
