/**
 * Model catalog
 */

export {
  DEFAULT_MODELS_FILE,
  loadModelFile,
  parseModelFile,
  registerModelFiles,
} from './loader.js';
export { ModelRegistry } from './registry.js';
