/**
 * Configuration errors raised while resolving a rule specification.
 *
 * Validation failures are never thrown; they land in the ErrorBag. A
 * ConfigurationError means the rules themselves are wrong and the whole
 * `validate` call is aborted before any rule runs.
 */

export type ConfigurationErrorKind =
  | 'unknown_rule'
  | 'missing_argument'
  | 'unexpected_argument'
  | 'invalid_argument'
  | 'missing_field';

export interface ConfigurationErrorDetails {
  field: string;
  rule: string;
}

export class ConfigurationError extends Error {
  readonly kind: ConfigurationErrorKind;
  readonly field: string;
  readonly rule: string;

  constructor(kind: ConfigurationErrorKind, message: string, details: ConfigurationErrorDetails) {
    super(message);
    this.name = 'ConfigurationError';
    this.kind = kind;
    this.field = details.field;
    this.rule = details.rule;
  }
}
