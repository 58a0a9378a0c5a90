import type { FormatType } from '../format-adapter.js';
import { anthropicAdapter } from './anthropic/index.js';
import type { AnthropicFormatAdapter } from './anthropic/index.js';
import { createOpenAIAdapter } from './openai/index.js';
import type { OpenAIAdapterOptions, OpenAIFormatAdapter } from './openai/index.js';
import { ConfigurationError } from '../../shared/errors/index.js';

/**
 * Provider Names - Actual services
 */
export type ProviderName = 'anthropic' | 'openai' | 'openrouter' | 'xai' | 'ollama';

/**
 * Provider to Format mapping
 */
export const PROVIDER_FORMATS: Readonly<Record<ProviderName, FormatType>> = {
  'anthropic': 'anthropic',
  'openai': 'openai',
  'openrouter': 'openai',
  'xai': 'openai',
  'ollama': 'openai',
};

export function isProviderName(value: string): value is ProviderName {
  return Object.hasOwn(PROVIDER_FORMATS, value);
}

export interface AdapterMap {
  anthropic: AnthropicFormatAdapter;
  openai: OpenAIFormatAdapter;
}

export interface AdapterRegistry {
  getAdapter<F extends FormatType>(formatType: F): AdapterMap[F];
  getProviderAdapter(providerName: ProviderName): AdapterMap[FormatType];
  formatFor(providerName: ProviderName): FormatType;
}

/**
 * Registry over a fixed set of adapters. Options bind the OpenAI adapter.
 */
export function createAdapterRegistry(openaiOptions: OpenAIAdapterOptions = {}): AdapterRegistry {
  const adapters: AdapterMap = Object.freeze({
    anthropic: anthropicAdapter,
    openai: createOpenAIAdapter(openaiOptions),
  });

  const formatFor = (providerName: ProviderName): FormatType => {
    if (!isProviderName(providerName)) throw new ConfigurationError(`Unknown provider: ${providerName}`);
    return PROVIDER_FORMATS[providerName];
  };

  return {
    getAdapter: (formatType) => {
      if (!Object.hasOwn(adapters, formatType)) throw new ConfigurationError(`No adapter for format: ${formatType}`);
      return adapters[formatType];
    },
    getProviderAdapter: (providerName) => adapters[formatFor(providerName)],
    formatFor,
  };
}

const defaultRegistry = createAdapterRegistry();

export function getAdapter<F extends FormatType>(formatType: F): AdapterMap[F] {
  return defaultRegistry.getAdapter(formatType);
}

export function getProviderAdapter(providerName: ProviderName): AdapterMap[FormatType] {
  return defaultRegistry.getProviderAdapter(providerName);
}
