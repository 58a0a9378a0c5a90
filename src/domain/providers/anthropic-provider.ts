import { BaseProvider } from './base-provider.js';
import type { ChatRequest, ChatResponse } from '../../canonical/types/index.js';
import { anthropicAdapter, ANTHROPIC_VERSION } from '../../canonical/adapters/anthropic/index.js';
import type { AuthConfig } from '../types/transport.js';

export const ANTHROPIC_BASE_URL = 'https://api.anthropic.com/v1';

export class AnthropicProvider extends BaseProvider {
  readonly format = 'anthropic' as const;

  protected getAuth(): AuthConfig {
    return { header: 'x-api-key' };
  }

  protected getStaticHeaders(): Record<string, string> {
    return { 'anthropic-version': ANTHROPIC_VERSION };
  }

  protected getChatCompletionEndpoint(): string {
    return '/messages';
  }

  transformRequest(request: ChatRequest): ChatRequest {
    return anthropicAdapter.canonicalToProvider(request);
  }

  transformResponse(response: unknown): ChatResponse {
    return anthropicAdapter.providerToCanonical(response);
  }
}
