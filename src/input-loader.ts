/**
 * Input Loader - Reads data and rule files for the CLI
 */

import * as fs from 'fs';
import * as path from 'path';
import type { InputData, InputScalar, InputValue, RuleDefinitionInput, RuleSpecification } from './types';

function readJsonObject(filePath: string, label: string): Record<string, unknown> {
  const resolved = path.resolve(process.cwd(), filePath);

  if (!fs.existsSync(resolved)) {
    throw new Error(`${label} file not found: ${filePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (error) {
    throw new Error(`Cannot read ${label.toLowerCase()} file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!isPlainObject(parsed)) {
    throw new Error(`${label} file ${filePath} must contain a JSON object`);
  }

  return parsed;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is InputScalar {
  return value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function isInputValue(value: unknown): value is InputValue {
  return isScalar(value) || (Array.isArray(value) && value.every(isScalar));
}

function isRuleDefinition(value: unknown): value is RuleDefinitionInput {
  return typeof value === 'string' || (Array.isArray(value) && value.every((token) => typeof token === 'string'));
}

/**
 * Load field values: a JSON object of scalars (or flat lists of scalars)
 */
export function loadDataFile(filePath: string): InputData {
  const raw = readJsonObject(filePath, 'Data');
  const entries = Object.entries(raw).map(([field, value]) => {
    if (!isInputValue(value)) {
      throw new Error(`Data file ${filePath}: field "${field}" must be a string, number, boolean, null or a flat list of those`);
    }
    return [field, value] as const;
  });

  return Object.fromEntries(entries);
}

/**
 * Load rule definitions: a JSON object of rule strings or arrays of rule tokens
 */
export function loadRuleFile(filePath: string): RuleSpecification {
  const raw = readJsonObject(filePath, 'Rules');
  const entries = Object.entries(raw).map(([field, definition]) => {
    if (!isRuleDefinition(definition)) {
      throw new Error(`Rules file ${filePath}: field "${field}" must be a rule string or an array of rule strings`);
    }
    return [field, definition] as const;
  });

  return Object.fromEntries(entries);
}
