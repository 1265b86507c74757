/**
 * OutputFormatter - Handles console output formatting for formcheck
 *
 * Reports go to stdout, errors and warnings to stderr. Text reports use the
 * ✅ / 🚫 prefixes; JSON output is printed as-is so it can be piped.
 */

import type { RuleDefinition } from './rule-catalog';
import type { GroupedErrors } from './error-bag';
import { MESSAGES } from './message-catalog';

export interface ReportSummary {
  fieldCount: number;
  errors: GroupedErrors;
}

export class OutputFormatter {
  /**
   * Display a text validation report
   */
  displayReport(summary: ReportSummary): void {
    if (summary.errors.size === 0) {
      console.log(`✅ PASSED: ${summary.fieldCount} ${this.plural(summary.fieldCount, 'field')} validated`);
      return;
    }

    const fieldLines: string[] = [];
    let messageCount = 0;

    for (const [field, messages] of summary.errors) {
      fieldLines.push(`  ${field}:`);
      for (const message of messages) {
        fieldLines.push(`    - ${message}`);
      }
      messageCount += messages.length;
    }

    const fieldCount = summary.errors.size;
    const header = `🚫 FAILED: ${messageCount} ${this.plural(messageCount, 'error')} in ${fieldCount} ${this.plural(fieldCount, 'field')}`;

    console.log([header, ...fieldLines].join('\n'));
  }

  /**
   * Display the rule catalog, one rule per line
   */
  displayCatalog(definitions: readonly RuleDefinition[]): void {
    const usages = definitions.map((definition) => this.usage(definition));
    const width = Math.max(...usages.map((usage) => usage.length));

    const lines = definitions.map(
      (definition, index) => `  ${usages[index].padEnd(width)}  ${MESSAGES[definition.message]}`
    );

    console.log(['Available rules:', ...lines].join('\n'));
  }

  /**
   * Display messages one per line, without decoration
   */
  displayMessages(messages: readonly string[]): void {
    if (messages.length > 0) {
      console.log(messages.join('\n'));
    }
  }

  displayJson(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
  }

  /**
   * Display grouped errors as a JSON object whose keys keep the map's order.
   * Going through a plain object would move "2" ahead of "zip".
   */
  displayGroupedJson(errors: GroupedErrors): void {
    if (errors.size === 0) {
      console.log('{}');
      return;
    }

    const members = [...errors].map(
      ([field, messages]) => `  ${JSON.stringify(field)}: ${JSON.stringify(messages, null, 2).replace(/\n/g, '\n  ')}`
    );
    console.log(`{\n${members.join(',\n')}\n}`);
  }

  displayError(message: string): void {
    console.error(`❌ Error: ${message}`);
  }

  displayWarning(message: string): void {
    console.warn(`⚠️  Warning: ${message}`);
  }

  displayInfo(message: string): void {
    console.log(`ℹ️  ${message}`);
  }

  private usage(definition: RuleDefinition): string {
    switch (definition.argument) {
      case 'none':
        return definition.name;
      case 'length':
        return `${definition.name}:<length>`;
      case 'pattern':
        return `${definition.name}:<pattern>`;
      case 'field':
        return definition.fixedField === undefined ? `${definition.name}:<field>` : definition.name;
    }
  }

  private plural(count: number, word: string): string {
    return count === 1 ? word : `${word}s`;
  }
}
