/**
 * Variable store and substitution for script execution
 *
 * Placeholders are written <[name]> and may use dotted paths into nested
 * values: <[llm.description]>.
 */

import { UndefinedVariableError } from '../errors.js';
import type { VariableStore } from './types.js';

const PLACEHOLDER = /<\[(.*?)\]>/gs;
const OPENER = '<[';

/**
 * Create a variable store, optionally seeded
 */
export function createVariableStore(
  initial: Record<string, unknown> = {}
): VariableStore {
  return { values: { ...initial } };
}

/**
 * Set a variable (top-level name)
 */
export function setVariable(
  store: VariableStore,
  name: string,
  value: unknown
): void {
  store.values[name] = value;
}

/**
 * Resolve a dotted path against the store
 * Throws UndefinedVariableError when any segment is missing
 */
export function lookupVariable(store: VariableStore, name: string): unknown {
  let current: unknown = store.values;
  for (const key of name.split('.')) {
    if (
      typeof current !== 'object' ||
      current === null ||
      !Object.prototype.hasOwnProperty.call(current, key)
    ) {
      throw new UndefinedVariableError(name);
    }
    current = Reflect.get(current, key);
  }
  return current;
}

/**
 * Format a variable value for insertion into text
 */
export function formatVariableValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
}

/**
 * Substitute <[name]> placeholders in a single left-to-right pass.
 * Inserted values are not rescanned. A placeholder containing another
 * opener is nested and rejected.
 */
export function substituteVariables(text: string, store: VariableStore): string {
  if (!text.includes(OPENER)) return text;

  return text.replace(PLACEHOLDER, (_match, name: string) => {
    if (name.includes(OPENER)) {
      throw new UndefinedVariableError(name);
    }
    return formatVariableValue(lookupVariable(store, name));
  });
}

/**
 * Names of the placeholders used in a text (for logging)
 */
export function getSubstitutionList(text: string): string[] {
  const names: string[] = [];
  for (const match of text.matchAll(PLACEHOLDER)) {
    const name = match[1];
    if (name !== undefined && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}
