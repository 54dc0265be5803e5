/**
 * API key lookup per provider
 */

import { MissingApiKeyError } from '../errors.js';

export interface CredentialStore {
  getApiKey(provider: string): string;
}

/**
 * Environment variable holding a provider's key, e.g. ANTHROPIC_API_KEY
 */
export function apiKeyEnvVar(provider: string): string {
  return `${provider.toUpperCase().replace(/[^A-Z0-9]/g, '_')}_API_KEY`;
}

/**
 * Reads keys from `<PROVIDER>_API_KEY`
 */
export class EnvCredentialStore implements CredentialStore {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  getApiKey(provider: string): string {
    const envVar = apiKeyEnvVar(provider);
    const key = this.env[envVar];
    if (!key) {
      throw new MissingApiKeyError(provider, envVar);
    }
    return key;
  }
}

/**
 * Fixed keys, for tests and embedding
 */
export class StaticCredentialStore implements CredentialStore {
  constructor(private readonly keys: Readonly<Record<string, string>>) {}

  getApiKey(provider: string): string {
    const key = this.keys[provider];
    if (!key) {
      throw new MissingApiKeyError(provider, apiKeyEnvVar(provider));
    }
    return key;
  }
}
