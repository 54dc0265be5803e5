/**
 * Model catalog types
 */

export interface ModelCapabilities {
  functions: boolean;
  vision: boolean;
}

/**
 * One catalog entry, immutable once registered
 */
export interface ModelDefinition {
  /** Adapter id, e.g. "anthropic" */
  provider: string;
  /** Display name of the vendor */
  company: string;
  modelId: string;
  inputCostPerToken: number;
  outputCostPerToken: number;
  /** Context window size */
  maxTokens: number;
  capabilities: ModelCapabilities;
  description: string;
}
