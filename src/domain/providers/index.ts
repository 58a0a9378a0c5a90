import type { ClientConfig } from '../client/client-config.js';
import type { Transport } from '../types/transport.js';
import { AnthropicProvider } from './anthropic-provider.js';
import { BaseProvider } from './base-provider.js';
import { OpenAICompatibleProvider } from './openai-provider.js';

export { AnthropicProvider, BaseProvider, OpenAICompatibleProvider };
export type { CallOptions, ProviderSettings } from './base-provider.js';

/**
 * Provider for the configured wire format
 */
export function createProvider(config: ClientConfig, transport: Transport): BaseProvider {
  const settings = {
    name: config.provider,
    baseUrl: config.baseUrl,
    apiKey: config.apiKey,
    timeoutMs: config.timeoutMs,
  };

  switch (config.format) {
    case 'anthropic':
      return new AnthropicProvider(settings, transport);
    case 'openai':
      return new OpenAICompatibleProvider(settings, transport, {
        supportsReasoningEffort: config.reasoningEffort,
      });
  }
}
