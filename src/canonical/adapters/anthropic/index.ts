import type { FormatAdapter } from '../../format-adapter.js';
import type { ChatRequest, ChatResponse } from '../../types/index.js';
import type { ChatRequestInput } from '../../validation/canonical-validator.js';
import { parseChatRequest, parseChatResponse } from '../../validation/canonical-validator.js';
import { foldSystemMessages } from './messages.js';

export type AnthropicRequest = ChatRequestInput;
export type AnthropicResponse = ChatResponse;

export type AnthropicFormatAdapter = FormatAdapter<AnthropicRequest, AnthropicResponse, ChatRequest>;

/**
 * Anthropic format adapter. The canonical model is the Messages wire shape,
 * so conversion is validation plus folding of system-role messages for the provider.
 */
export const anthropicAdapter: AnthropicFormatAdapter = {
  formatType: 'anthropic',

  clientToCanonical(clientRequest: AnthropicRequest): ChatRequest {
    return parseChatRequest(clientRequest);
  },

  canonicalToClient(canonical: ChatResponse): AnthropicResponse {
    return { ...canonical };
  },

  canonicalToProvider(canonical: ChatRequest): ChatRequest {
    return foldSystemMessages(canonical);
  },

  providerToCanonical(providerResponse: unknown): ChatResponse {
    return parseChatResponse(providerResponse);
  },
};

export { foldSystemMessages } from './messages.js';
export { normalizeStopReason, ANTHROPIC_VERSION } from './maps.js';
export * from './thinking.js';
