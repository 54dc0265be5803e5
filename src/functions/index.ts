/**
 * External tool executables
 */

export {
  FunctionRegistry,
  type FunctionRegistryOptions,
  listProviderExecutables,
} from './registry.js';
