/**
 * Prompt script lexer
 *
 * Line syntax:
 * - .keyword value      a statement
 * - anything else       continuation text (.text)
 *
 * Text lines directly after .system/.user/.assistant/.text are folded into
 * that statement. A script that does not end in .exec or .exit gets an
 * implicit .exec.
 */

import { KEYWORDS, type Keyword, type Statement } from './types.js';

/** Statements whose value absorbs following text lines */
const TEXT_OWNERS: readonly Keyword[] = [
  '.assistant',
  '.system',
  '.text',
  '.user',
];

/** Statements that end a script without an implicit .exec */
const TERMINATORS: readonly Keyword[] = ['.exec', '.exit'];

function isKeyword(value: string): value is Keyword {
  return KEYWORDS.some((k) => k === value);
}

/**
 * Split one trimmed line into keyword and value
 */
export function splitLine(line: string): { keyword: Keyword; value: string } {
  if (!line.startsWith('.')) {
    return { keyword: '.text', value: line };
  }

  const space = line.indexOf(' ');
  const head = space === -1 ? line : line.slice(0, space);
  const rest = space === -1 ? '' : line.slice(space + 1);

  if (!isKeyword(head)) {
    // Unknown dotted word is plain text
    return { keyword: '.text', value: line };
  }
  return { keyword: head, value: rest };
}

interface MutableStatement {
  sequenceNo: number;
  keyword: Keyword;
  value: string;
}

/**
 * Parse script content into statements
 */
export function parseScript(content: string): Statement[] {
  const statements: MutableStatement[] = [];
  const lines = content.split('\n');

  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (!line) continue;

    const parsed = splitLine(line);

    const last = statements[statements.length - 1];
    if (
      parsed.keyword === '.text' &&
      last !== undefined &&
      TEXT_OWNERS.includes(last.keyword)
    ) {
      last.value = `${last.value}\n${parsed.value}`.trim();
      continue;
    }

    statements.push({
      sequenceNo: statements.length,
      keyword: parsed.keyword,
      value: parsed.value,
    });
  }

  const final = statements[statements.length - 1];
  if (final === undefined || !TERMINATORS.includes(final.keyword)) {
    statements.push({
      sequenceNo: statements.length,
      keyword: '.exec',
      value: '',
    });
  }

  return statements;
}

/**
 * Display form of a statement: "03 .user     Hello"
 */
export function formatStatement(statement: Statement): string {
  const no = String(statement.sequenceNo).padStart(2, '0');
  return `${no} ${statement.keyword.padEnd(10)} ${statement.value}`.trimEnd();
}
