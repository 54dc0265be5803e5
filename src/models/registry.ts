/**
 * Model registry: which provider serves a model and what it costs
 */

import { RegistryLockedError, UnknownModelError } from '../errors.js';
import type { ModelDefinition } from '../types/models.js';

export class ModelRegistry {
  private readonly models = new Map<string, ModelDefinition>();
  private locked = false;

  /**
   * Merge definitions into the catalog (last write wins per id)
   */
  register(models: Record<string, ModelDefinition>): void {
    if (this.locked) {
      throw new RegistryLockedError();
    }
    for (const [id, definition] of Object.entries(models)) {
      this.models.set(id, Object.freeze({ ...definition, modelId: id }));
    }
  }

  /**
   * Refuse further registrations
   */
  lock(): void {
    this.locked = true;
  }

  get isLocked(): boolean {
    return this.locked;
  }

  has(modelId: string): boolean {
    return this.models.has(modelId);
  }

  lookup(modelId: string): ModelDefinition {
    const model = this.models.get(modelId);
    if (!model) {
      throw new UnknownModelError(modelId);
    }
    return model;
  }

  /**
   * Price of a call: tokensIn * input + tokensOut * output
   */
  cost(modelId: string, tokensIn: number, tokensOut: number): number {
    const model = this.lookup(modelId);
    return (
      tokensIn * model.inputCostPerToken + tokensOut * model.outputCostPerToken
    );
  }

  /**
   * Entries sorted by provider then id, optionally filtered by a
   * case-insensitive substring of the id or company
   */
  list(filter?: string): ModelDefinition[] {
    const needle = filter?.toLowerCase();
    return [...this.models.values()]
      .filter(
        (m) =>
          !needle ||
          m.modelId.toLowerCase().includes(needle) ||
          m.company.toLowerCase().includes(needle)
      )
      .sort(
        (a, b) =>
          a.provider.localeCompare(b.provider) ||
          a.modelId.localeCompare(b.modelId)
      );
  }

  get size(): number {
    return this.models.size;
  }
}
