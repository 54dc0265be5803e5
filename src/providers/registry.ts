/**
 * Adapter lookup by provider id
 */

import { UnknownProviderError } from '../errors.js';
import { anthropicAdapter } from './anthropic.js';
import { googleAdapter } from './google.js';
import {
  createOpenAiCompatibleAdapter,
  OPENAI_COMPATIBLE_VENDORS,
} from './openai-compatible.js';
import type { ProviderAdapter } from './types.js';

export class AdapterRegistry {
  private readonly adapters = new Map<string, ProviderAdapter>();

  constructor(adapters: readonly ProviderAdapter[] = []) {
    for (const adapter of adapters) {
      this.register(adapter);
    }
  }

  register(adapter: ProviderAdapter): void {
    this.adapters.set(adapter.provider, adapter);
  }

  has(provider: string): boolean {
    return this.adapters.has(provider);
  }

  get(provider: string): ProviderAdapter {
    const adapter = this.adapters.get(provider);
    if (!adapter) {
      throw new UnknownProviderError(provider);
    }
    return adapter;
  }

  providers(): string[] {
    return [...this.adapters.keys()].sort();
  }
}

/**
 * Registry holding every built-in vendor adapter
 */
export function createDefaultAdapters(): AdapterRegistry {
  return new AdapterRegistry([
    anthropicAdapter,
    googleAdapter,
    ...OPENAI_COMPATIBLE_VENDORS.map(createOpenAiCompatibleAdapter),
  ]);
}
