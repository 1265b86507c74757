/**
 * Validator - Main validation orchestrator
 */

import type { InputData, InputValue, RuleSpecification } from './types';
import { RuleEngine } from './rule-engine';
import { ErrorBag } from './error-bag';
import type { GroupedErrors } from './error-bag';

export class Validator {
  private readonly data: ReadonlyMap<string, InputValue>;
  private readonly errors: ErrorBag;
  private readonly engine: RuleEngine;

  constructor(data: InputData) {
    this.data = new Map(Object.entries(data));
    this.errors = new ErrorBag();
    this.engine = new RuleEngine();
  }

  /**
   * Run every rule of the specification against the data.
   *
   * Failures are recorded, never thrown. Errors from earlier calls are kept,
   * so calling this twice accumulates. Throws ConfigurationError for rules
   * that cannot be resolved, before any rule runs.
   */
  validate(rules: RuleSpecification): void {
    const plan = this.engine.compile(rules, this.data);
    this.engine.run(plan, this.data, this.errors);
  }

  passed(): boolean {
    return this.errors.isEmpty();
  }

  fails(): boolean {
    return !this.passed();
  }

  /**
   * Messages grouped by field, in the order the fields first failed.
   * Flattening the values gives exactly all().
   */
  getErrors(): GroupedErrors {
    return this.errors.toMap();
  }

  all(): string[] {
    return this.errors.all();
  }

  first(field: string): string | undefined {
    return this.errors.first(field);
  }
}
