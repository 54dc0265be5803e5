/**
 * Model catalog files
 *
 * Format: { "models": { "<model id>": { provider, company, ... } } }
 */

import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

import type { ModelDefinition } from '../types/models.js';
import type { ModelRegistry } from './registry.js';

const modelEntrySchema = z.object({
  provider: z.string().min(1),
  company: z.string().min(1),
  inputCostPerToken: z.number().nonnegative(),
  outputCostPerToken: z.number().nonnegative(),
  maxTokens: z.number().int().positive(),
  capabilities: z
    .object({
      functions: z.boolean().default(true),
      vision: z.boolean().default(false),
    })
    .default({}),
  description: z.string().default(''),
});

const modelFileSchema = z.object({
  models: z.record(modelEntrySchema),
});

/** Catalog shipped with the package */
export const DEFAULT_MODELS_FILE = fileURLToPath(
  new URL('../../models/models.json', import.meta.url)
);

/**
 * Validate a parsed catalog document
 */
export function parseModelFile(data: unknown): Record<string, ModelDefinition> {
  const parsed = modelFileSchema.parse(data);
  const models: Record<string, ModelDefinition> = {};
  for (const [modelId, entry] of Object.entries(parsed.models)) {
    models[modelId] = { ...entry, modelId };
  }
  return models;
}

/**
 * Read a catalog file
 */
export function loadModelFile(filePath: string): Record<string, ModelDefinition> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Model catalog not found: ${filePath}`);
  }
  const content = fs.readFileSync(filePath, 'utf-8');
  try {
    return parseModelFile(JSON.parse(content));
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid model catalog ${filePath}: ${msg}`, {
      cause: error,
    });
  }
}

/**
 * Register the bundled catalog and any extra catalog files, in order
 */
export function registerModelFiles(
  registry: ModelRegistry,
  files: string[] = [DEFAULT_MODELS_FILE]
): void {
  for (const file of files) {
    registry.register(loadModelFile(file));
  }
}
