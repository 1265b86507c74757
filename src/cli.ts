/**
 * CLI Interface - Main command-line interface
 */

import type { CLIOptions } from './types';
import { Validator } from './validator';
import { OutputFormatter } from './output-formatter';
import { RULE_CATALOG } from './rule-catalog';
import { RuleParser } from './rule-parser';
import { loadDataFile, loadRuleFile } from './input-loader';

export const VERSION = '1.0.0';

export class CLI {
  private formatter: OutputFormatter;

  constructor(formatter: OutputFormatter = new OutputFormatter()) {
    this.formatter = formatter;
  }

  /**
   * Main entry point for CLI
   *
   * Routes to:
   * - check: Validate a data file against a rules file
   * - rules: List the available rules
   *
   * Returns the process exit code: 0 when validation passes, 1 when it fails
   * or anything goes wrong.
   */
  async run(args: string[]): Promise<number> {
    try {
      if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
        this.displayUsage();
        return args.length === 0 ? 1 : 0;
      }

      if (args[0] === '--version' || args[0] === '-v' || args[0] === 'version') {
        console.log(`formcheck v${VERSION}`);
        return 0;
      }

      const subcommand = args[0];

      if (subcommand === 'check') {
        const options = this.parseArgs(args.slice(1));
        return this.handleCheck(options);
      }

      if (subcommand === 'rules') {
        this.formatter.displayCatalog(Object.values(RULE_CATALOG));
        return 0;
      }

      throw new Error(`Unknown command: ${subcommand}. Run "formcheck --help" for usage`);
    } catch (error) {
      this.formatter.displayError(error instanceof Error ? error.message : String(error));
      return 1;
    }
  }

  /**
   * Parse arguments of the check command
   *
   * Supports:
   * - --json: Print errors as JSON
   * - --flat: Print a flat list of messages instead of grouping by field
   * - --verbose: Report what was loaded
   */
  private parseArgs(args: string[]): CLIOptions {
    const options: CLIOptions = {
      dataPath: '',
      rulesPath: '',
      format: 'text',
      flat: false,
      verbose: false
    };
    const files: string[] = [];

    for (const arg of args) {
      if (arg === '--json') {
        options.format = 'json';
      } else if (arg === '--flat') {
        options.flat = true;
      } else if (arg === '--verbose') {
        options.verbose = true;
      } else if (arg.startsWith('--')) {
        throw new Error(`Unknown flag: ${arg}`);
      } else {
        files.push(arg);
      }
    }

    if (files.length !== 2) {
      throw new Error('check command requires a data file and a rules file (usage: formcheck check <data.json> <rules.json>)');
    }

    options.dataPath = files[0];
    options.rulesPath = files[1];
    return options;
  }

  private displayUsage(): void {
    console.log(`
formcheck - Declarative field validation

Usage:
  formcheck check <data.json> <rules.json>   Validate data against rules
  formcheck rules                            List available rules

Flags:
  --json                                     Print errors as JSON
  --flat                                     Print one list of messages instead of grouping by field
  --verbose                                  Report how many fields and rules were loaded

Rules file:
  { "email": "required|email", "password": ["required", "min:8", "regex:/^(a|b)+$/"] }

Examples:
  formcheck check signup.json signup.rules.json
  formcheck check signup.json signup.rules.json --json --flat
    `.trim());
  }

  /**
   * Handle check command
   *
   * Steps:
   * 1. Load data and rules
   * 2. Validate (configuration errors propagate to run())
   * 3. Print the report in the requested format
   */
  private handleCheck(options: CLIOptions): number {
    const data = loadDataFile(options.dataPath);
    const rules = loadRuleFile(options.rulesPath);

    const fields = Object.keys(rules);
    if (fields.length === 0) {
      this.formatter.displayWarning(`No rules defined in ${options.rulesPath}`);
    }

    if (options.verbose) {
      const parser = new RuleParser();
      const ruleCount = parser.parseAll(rules).reduce((total, entry) => total + entry.invocations.length, 0);
      this.formatter.displayInfo(`Loaded ${Object.keys(data).length} data fields and ${ruleCount} rules for ${fields.length} fields`);
    }

    const validator = new Validator(data);
    validator.validate(rules);

    if (options.format === 'json' && options.flat) {
      this.formatter.displayJson(validator.all());
    } else if (options.format === 'json') {
      this.formatter.displayGroupedJson(validator.getErrors());
    } else if (options.flat) {
      this.formatter.displayMessages(validator.all());
    } else {
      this.formatter.displayReport({ fieldCount: fields.length, errors: validator.getErrors() });
    }

    return validator.passed() ? 0 : 1;
  }
}
