/**
 * Adapter Registry Tests
 */

import { describe, test, expect } from 'vitest';
import {
  createAdapterRegistry,
  getAdapter,
  getProviderAdapter,
  isProviderName,
  PROVIDER_FORMATS,
} from '../../../adapters/registry.js';
import type { ProviderName } from '../../../adapters/registry.js';
import { anthropicAdapter } from '../../../adapters/anthropic/index.js';

describe('Adapter Registry', () => {
  describe('Format Adapter Resolution', () => {
    test('retrieves adapters by format', () => {
      expect(getAdapter('anthropic')).toBe(anthropicAdapter);
      expect(getAdapter('openai').formatType).toBe('openai');
    });

    test('binds options to the OpenAI adapter', () => {
      const registry = createAdapterRegistry({ supportsReasoningEffort: true });
      expect(registry.getAdapter('openai').options).toEqual({ supportsReasoningEffort: true });
    });
  });

  describe('Provider Adapter Resolution', () => {
    test('resolves provider to correct format adapter', () => {
      expect(getProviderAdapter('anthropic').formatType).toBe('anthropic');
      expect(getProviderAdapter('openrouter').formatType).toBe('openai');
      expect(getProviderAdapter('ollama').formatType).toBe('openai');
    });

    test('maps every provider to a format', () => {
      const providers: ProviderName[] = ['anthropic', 'openai', 'openrouter', 'xai', 'ollama'];
      expect(providers.map(p => PROVIDER_FORMATS[p])).toEqual(['anthropic', 'openai', 'openai', 'openai', 'openai']);
    });

    test('recognizes provider names', () => {
      expect(isProviderName('xai')).toBe(true);
      expect(isProviderName('google')).toBe(false);
      expect(isProviderName('toString')).toBe(false);
    });
  });
});
