import '../config.js';
import { isProviderName } from '../../canonical/adapters/registry.js';
import type { ProviderName } from '../../canonical/adapters/registry.js';
import { ClientConfig } from '../../domain/client/client-config.js';
import { ConfigurationError } from '../../shared/errors/index.js';

/**
 * Centralized environment configuration.
 * All environment variables are validated and accessed through this class.
 */
export class AppConfig {
  readonly llm = {
    provider: this.getProvider('LLM_PROVIDER', 'anthropic'),
    model: this.getOptionalString('LLM_MODEL'),
    baseUrl: this.getOptionalString('LLM_BASE_URL'),
    maxTokens: this.getOptionalNumber('LLM_MAX_TOKENS'),
    timeoutMs: this.getOptionalNumber('LLM_TIMEOUT_MS'),
    embeddingsModel: this.getOptionalString('EMBEDDINGS_MODEL'),
    reasoningEffort: this.getBoolean('LLM_REASONING_EFFORT', false),
  };

  // Provider API Keys
  readonly providers: Record<ProviderName, { apiKey?: string; enabled: boolean }> = {
    anthropic: this.apiKey('ANTHROPIC_API_KEY'),
    openai: this.apiKey('OPENAI_API_KEY'),
    openrouter: this.apiKey('OPENROUTER_API_KEY'),
    xai: this.apiKey('XAI_API_KEY'),
    ollama: { enabled: true },
  };

  /**
   * Client configuration for LLM_PROVIDER, with the optional overrides applied
   */
  toClientConfig(): ClientConfig {
    const { provider, model, baseUrl, maxTokens, timeoutMs, embeddingsModel, reasoningEffort } = this.llm;
    if (!model) {
      throw new ConfigurationError('Missing required environment variable: LLM_MODEL');
    }

    const { apiKey } = this.providers[provider];
    if (!apiKey && provider !== 'ollama') {
      throw new ConfigurationError(`No API key configured for ${provider}`, { provider });
    }

    let config = ClientConfig.forProvider(provider, apiKey ?? '', model);
    if (baseUrl) config = config.withBaseUrl(baseUrl);
    if (maxTokens !== undefined) config = config.withMaxTokens(maxTokens);
    if (timeoutMs !== undefined) config = config.withTimeout(timeoutMs);
    if (embeddingsModel) config = config.withEmbeddings(embeddingsModel);
    if (reasoningEffort) config = config.withReasoningEffort();
    return config;
  }

  // Helper methods
  private apiKey(key: string): { apiKey?: string; enabled: boolean } {
    const apiKey = this.getOptionalString(key);
    return apiKey ? { apiKey, enabled: true } : { enabled: false };
  }

  private getOptionalString(key: string): string | undefined {
    return process.env[key] || undefined;
  }

  private getOptionalNumber(key: string): number | undefined {
    const value = process.env[key];
    if (!value) return undefined;
    const num = parseInt(value, 10);
    if (isNaN(num)) {
      throw new ConfigurationError(`Invalid number for environment variable ${key}: ${value}`, { key });
    }
    return num;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) return defaultValue;
    return value.toLowerCase() === 'true' || value === '1';
  }

  private getProvider(key: string, defaultValue: ProviderName): ProviderName {
    const value = process.env[key];
    if (!value) return defaultValue;
    const name = value.toLowerCase();
    if (!isProviderName(name)) {
      throw new ConfigurationError(`Unknown provider in ${key}: ${value}`, { key });
    }
    return name;
  }
}

// Singleton instance
let configInstance: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = new AppConfig();
  }
  return configInstance;
}

/** Drop the cached instance so the next getConfig() re-reads the environment */
export function resetConfig(): void {
  configInstance = null;
}
