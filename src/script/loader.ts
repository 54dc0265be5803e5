/**
 * Script file loading
 */

import * as fs from 'fs';

import { parseScript } from './parser.js';
import type { ParsedScript } from './types.js';

/**
 * Load and parse a prompt script
 *
 * @param scriptFile - Path to the .prompt file
 */
export function loadScript(scriptFile: string): ParsedScript {
  if (!fs.existsSync(scriptFile)) {
    throw new Error(`Script not found: ${scriptFile}`);
  }

  const content = fs.readFileSync(scriptFile, 'utf-8');
  return { filename: scriptFile, statements: parseScript(content) };
}
