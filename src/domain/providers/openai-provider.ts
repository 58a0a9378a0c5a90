import { BaseProvider } from './base-provider.js';
import type { ProviderSettings } from './base-provider.js';
import type { ChatRequest, ChatResponse, EmbeddingRequest, EmbeddingResponse } from '../../canonical/types/index.js';
import { createOpenAIAdapter } from '../../canonical/adapters/openai/index.js';
import type {
  OpenAIAdapterOptions,
  OpenAIEmbeddingRequest,
  OpenAIFormatAdapter,
  OpenAIProviderRequest,
} from '../../canonical/adapters/openai/index.js';
import type { AuthConfig, Transport } from '../types/transport.js';

/**
 * Any server speaking the OpenAI chat completions API: OpenAI, OpenRouter, xAI, Ollama, ...
 */
export class OpenAICompatibleProvider extends BaseProvider {
  readonly format = 'openai' as const;
  private readonly adapter: OpenAIFormatAdapter;

  constructor(settings: ProviderSettings, transport: Transport, adapterOptions: OpenAIAdapterOptions = {}) {
    super(settings, transport);
    this.adapter = createOpenAIAdapter(adapterOptions);
  }

  protected getAuth(): AuthConfig {
    return { header: 'Authorization', scheme: 'Bearer' };
  }

  protected getEmbeddingsEndpoint(): string {
    return '/embeddings';
  }

  transformRequest(request: ChatRequest): OpenAIProviderRequest {
    return this.adapter.canonicalToProvider(request);
  }

  transformResponse(response: unknown): ChatResponse {
    return this.adapter.providerToCanonical(response);
  }

  protected transformEmbeddingRequest(request: EmbeddingRequest): OpenAIEmbeddingRequest {
    return this.adapter.embeddings.canonicalToProvider(request);
  }

  protected transformEmbeddingResponse(response: unknown, expectedCount: number): EmbeddingResponse {
    return this.adapter.embeddings.providerToCanonical(response, expectedCount);
  }
}
