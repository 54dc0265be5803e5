/**
 * Script module - lexing, loading, and variable management
 */

// Types
export type {
  Keyword,
  ParsedScript,
  Statement,
  VariableStore,
} from './types.js';
export { KEYWORDS } from './types.js';

// Loader
export { loadScript } from './loader.js';

// Parser
export { formatStatement, parseScript, splitLine } from './parser.js';

// Variables
export {
  createVariableStore,
  formatVariableValue,
  getSubstitutionList,
  lookupVariable,
  setVariable,
  substituteVariables,
} from './variables.js';
