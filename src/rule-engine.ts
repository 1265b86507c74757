/**
 * Rule Engine - Resolves rule invocations and applies them to input data
 *
 * Validation happens in two passes:
 * 1. compile: every invocation of every field is looked up in the catalog and
 *    its argument checked. Any problem throws ConfigurationError, so a bad
 *    specification records nothing.
 * 2. run: each field's checks execute in written order. A failed check adds a
 *    message and the next check still runs.
 */

import type {
  InputValue,
  RuleSpecification,
  RuleInvocation,
  CompiledCheck,
  CompiledField
} from './types';
import { RuleParser } from './rule-parser';
import { RULE_CATALOG, isRuleName } from './rule-catalog';
import { ConfigurationError } from './errors';
import type { ErrorBag } from './error-bag';
import { renderMessage } from './message-catalog';
import { isEmpty, compilePattern } from './value-utils';

export type DataSource = ReadonlyMap<string, InputValue>;

const LENGTH_ARGUMENT = /^\d+$/;

export class RuleEngine {
  private parser: RuleParser;

  constructor(parser: RuleParser = new RuleParser()) {
    this.parser = parser;
  }

  /**
   * Resolve a whole specification against the data it will run on
   */
  compile(rules: RuleSpecification, data: DataSource): CompiledField[] {
    return this.parser.parseAll(rules).map(({ field, invocations }) => ({
      field,
      checks: invocations.map((invocation) => this.compileInvocation(field, invocation, data))
    }));
  }

  /**
   * Run compiled checks, appending a rendered message for every failure
   */
  run(plan: readonly CompiledField[], data: DataSource, errors: ErrorBag): void {
    for (const { field, checks } of plan) {
      const value = data.get(field);

      for (const check of checks) {
        if (check.skipsEmpty && isEmpty(value)) {
          continue;
        }

        if (!check.test(value)) {
          errors.add(field, renderMessage(check.message, field, check.messageValue));
        }
      }
    }
  }

  private compileInvocation(field: string, invocation: RuleInvocation, data: DataSource): CompiledCheck {
    const { rule } = invocation;

    if (!isRuleName(rule)) {
      const label = rule === '' ? `Empty rule in "${invocation.raw}"` : `Unknown validation rule "${rule}"`;
      throw new ConfigurationError('unknown_rule', `${label} for field "${field}"`, { field, rule });
    }

    const definition = RULE_CATALOG[rule];
    const base = {
      rule,
      message: definition.message,
      skipsEmpty: definition.skipsEmpty
    };

    switch (definition.argument) {
      case 'none': {
        this.rejectArgument(field, invocation);
        return { ...base, test: (value) => definition.passes(value) };
      }

      case 'length': {
        const limit = this.requireArgument(field, invocation);
        if (!LENGTH_ARGUMENT.test(limit)) {
          throw new ConfigurationError(
            'invalid_argument',
            `Rule "${rule}" for field "${field}" expects a whole number, got "${limit}"`,
            { field, rule }
          );
        }
        const size = Number(limit);
        return { ...base, messageValue: limit, test: (value) => definition.passes(value, size) };
      }

      case 'pattern': {
        const source = this.requireArgument(field, invocation);
        let pattern: RegExp;
        try {
          pattern = compilePattern(source);
        } catch (error) {
          throw new ConfigurationError(
            'invalid_argument',
            `Rule "${rule}" for field "${field}" has an invalid pattern: ${error instanceof Error ? error.message : String(error)}`,
            { field, rule }
          );
        }
        return { ...base, test: (value) => definition.passes(value, pattern) };
      }

      case 'field': {
        let other: string;
        if (definition.fixedField !== undefined) {
          this.rejectArgument(field, invocation);
          other = definition.fixedField;
        } else {
          other = this.requireArgument(field, invocation);
        }

        if (!data.has(other)) {
          throw new ConfigurationError(
            'missing_field',
            `Rule "${rule}" for field "${field}" compares against "${other}", which is not in the data`,
            { field, rule }
          );
        }

        const otherValue = data.get(other);
        return {
          ...base,
          // confirmed's message has no second placeholder
          messageValue: definition.fixedField === undefined ? other : undefined,
          test: (value) => definition.passes(value, otherValue)
        };
      }
    }
  }

  private requireArgument(field: string, invocation: RuleInvocation): string {
    if (invocation.argument === undefined || invocation.argument === '') {
      throw new ConfigurationError(
        'missing_argument',
        `Rule "${invocation.rule}" for field "${field}" requires an argument`,
        { field, rule: invocation.rule }
      );
    }
    return invocation.argument;
  }

  private rejectArgument(field: string, invocation: RuleInvocation): void {
    if (invocation.argument !== undefined) {
      throw new ConfigurationError(
        'unexpected_argument',
        `Rule "${invocation.rule}" for field "${field}" does not take an argument`,
        { field, rule: invocation.rule }
      );
    }
  }
}
