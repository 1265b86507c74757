/**
 * Rule Parser - Splits rule definitions into ordered invocations
 *
 * `"required|min:8|same:password_confirm"` becomes three invocations, in
 * written order. Each token is split on its first `:` only, so an argument
 * may contain colons but a string definition can never carry a `|` inside an
 * argument; use the array form for that.
 */

import type { RuleDefinitionInput, RuleInvocation, RuleSpecification, FieldRules } from './types';

export class RuleParser {
  /**
   * Parse one field's rule definition
   */
  parse(definition: RuleDefinitionInput): RuleInvocation[] {
    const tokens = typeof definition === 'string' ? definition.split('|') : definition;
    return tokens.map((token) => this.parseToken(token));
  }

  /**
   * Parse every field of a specification, keeping the specification's key order
   */
  parseAll(rules: RuleSpecification): FieldRules[] {
    return Object.entries(rules).map(([field, definition]) => ({
      field,
      invocations: this.parse(definition)
    }));
  }

  private parseToken(token: string): RuleInvocation {
    const separator = token.indexOf(':');

    if (separator === -1) {
      return { rule: token.trim(), raw: token };
    }

    return {
      rule: token.substring(0, separator).trim(),
      argument: token.substring(separator + 1),
      raw: token
    };
  }
}
