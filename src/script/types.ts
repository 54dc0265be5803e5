/**
 * Types for parsed prompt scripts
 */

export const KEYWORDS = [
  '.#',
  '.assistant',
  '.clear',
  '.cmd',
  '.debug',
  '.exec',
  '.exit',
  '.image',
  '.include',
  '.llm',
  '.system',
  '.text',
  '.user',
] as const;

export type Keyword = (typeof KEYWORDS)[number];

/**
 * One directive of a prompt script
 */
export interface Statement {
  readonly sequenceNo: number;
  readonly keyword: Keyword;
  readonly value: string;
}

/**
 * Result of parsing a script file
 */
export interface ParsedScript {
  filename: string;
  statements: Statement[];
}

/**
 * Variables visible to <[name]> placeholders
 */
export interface VariableStore {
  values: Record<string, unknown>;
}
