#!/usr/bin/env node
/**
 * formcheck - Main entry point
 */

import { CLI } from './cli';
import { requireSupportedNode } from './version-checker';

export async function main(args: string[]): Promise<number> {
  if (!requireSupportedNode()) {
    return 1;
  }

  const cli = new CLI();
  return await cli.run(args);
}

// Run if called directly
if (require.main === module) {
  main(process.argv.slice(2))
    .then((exitCode) => {
      process.exit(exitCode);
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}

export * from './types';
export { Validator } from './validator';
export { RuleParser } from './rule-parser';
export { RuleEngine } from './rule-engine';
export type { DataSource } from './rule-engine';
export { ErrorBag } from './error-bag';
export { ConfigurationError } from './errors';
export type { ConfigurationErrorKind, ConfigurationErrorDetails } from './errors';
export { RULE_CATALOG, CONFIRMATION_FIELD, isRuleName } from './rule-catalog';
export type { RuleDefinition, PlainRule, LengthRule, FieldRule, PatternRule, ArgumentKind } from './rule-catalog';
export { MESSAGES, compileTemplate, renderTemplate, renderMessage } from './message-catalog';
export type { TemplateSegment } from './message-catalog';
export { loadDataFile, loadRuleFile } from './input-loader';
export { CLI, VERSION } from './cli';
export { OutputFormatter } from './output-formatter';
export type { ReportSummary } from './output-formatter';
export type { GroupedErrors } from './error-bag';
export { checkNodeVersion, compareVersions, requireSupportedNode } from './version-checker';
export type { VersionCheckResult } from './version-checker';
